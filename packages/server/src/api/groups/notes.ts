import { Group, readJsonBody } from "@my-app/rest-api";
import { NOTE_TYPES, type NoteManager } from "@my-app/core/database";
import { z } from "zod";
import { withResourceErrors } from "../errors.js";
import { principalOf, requireResourceId, resourceIdOf, type Principal } from "../principal.js";
import { deleted, resourceSet, singleResource } from "../responses.js";

const CreateNoteSchema = z.object({
  type: z.enum(NOTE_TYPES).default("plain"),
  title: z.string().trim().min(1).max(128),
  body: z.string().default(""),
});

const UpdateNoteSchema = z
  .strictObject({
    type: z.enum(NOTE_TYPES).optional(),
    title: z.string().trim().min(1).max(128).optional(),
    body: z.string().optional(),
  })
  .refine((changes) => Object.keys(changes).length > 0, "nothing to update");

export interface NotesGroupDeps {
  notes: NoteManager;
}

export function notesGroup(deps: NotesGroupDeps): Group<Principal> {
  return new Group<Principal>({ urlPrefix: "notes", description: "Notes" })
    .addEndpoint({
      urlSuffixes: ["notes", "notes/", "notes/(?<resourceId>[0-9]+)"],
      httpMethods: ["GET"],
      name: "notes",
      description: "Retrieves all notes, newest first, or one by ID",
      authNeeded: true,
      authScopes: { GET: ["notes.retrieve"] },
      handler: (auth, match) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = resourceIdOf(match);
          return id === undefined
            ? resourceSet(deps.notes.list(user))
            : singleResource(deps.notes.get(user, id));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["note"],
      httpMethods: ["POST"],
      name: "note",
      description: "Creates a note",
      authNeeded: true,
      authScopes: { POST: ["notes.create"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const body = readJsonBody(request, CreateNoteSchema);
          return singleResource(deps.notes.create(user, body));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["note/(?<resourceId>[0-9]+)"],
      httpMethods: ["PATCH", "DELETE"],
      name: "note",
      description: "Updates or deletes a note",
      authNeeded: true,
      authScopes: { PATCH: ["notes.update"], DELETE: ["notes.delete"] },
      handler: (auth, match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = requireResourceId(match);
          if (request.method === "DELETE") {
            deps.notes.delete(user, id);
            return deleted();
          }
          const changes = readJsonBody(request, UpdateNoteSchema);
          return singleResource(deps.notes.update(user, id, changes));
        }),
    });
}
