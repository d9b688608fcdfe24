import { Group, readJsonBody } from "@my-app/rest-api";
import type { TagManager } from "@my-app/core/database";
import { z } from "zod";
import { withResourceErrors } from "../errors.js";
import { principalOf, requireResourceId, resourceIdOf, type Principal } from "../principal.js";
import { deleted, resourceSet, singleResource } from "../responses.js";

const TagBodySchema = z.object({
  title: z.string().trim().min(1).max(64),
});

export interface TagsGroupDeps {
  tags: TagManager;
}

export function tagsGroup(deps: TagsGroupDeps): Group<Principal> {
  return new Group<Principal>({ urlPrefix: "tags", description: "Tags" })
    .addEndpoint({
      urlSuffixes: ["tags", "tags/", "tags/(?<resourceId>[0-9]+)"],
      httpMethods: ["GET"],
      name: "tags",
      description: "Retrieves all tags, or one by ID",
      authNeeded: true,
      authScopes: { GET: ["tags.retrieve"] },
      handler: (auth, match) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = resourceIdOf(match);
          return id === undefined
            ? resourceSet(deps.tags.list(user))
            : singleResource(deps.tags.get(user, id));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["tag"],
      httpMethods: ["POST"],
      name: "tag",
      description: "Creates a tag",
      authNeeded: true,
      authScopes: { POST: ["tags.create"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const body = readJsonBody(request, TagBodySchema);
          return singleResource(deps.tags.create(user, body));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["tag/(?<resourceId>[0-9]+)"],
      httpMethods: ["PATCH", "DELETE"],
      name: "tag",
      description: "Updates or deletes a tag",
      authNeeded: true,
      authScopes: { PATCH: ["tags.update"], DELETE: ["tags.delete"] },
      handler: (auth, match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = requireResourceId(match);
          if (request.method === "DELETE") {
            deps.tags.delete(user, id);
            return deleted();
          }
          const body = readJsonBody(request, TagBodySchema);
          return singleResource(deps.tags.update(user, id, body));
        }),
    });
}
