import {
  CalendarDate,
  Group,
  InvalidInputError,
  ResourceNotFoundError,
  readJsonBody,
} from "@my-app/rest-api";
import type { DateTagManager } from "@my-app/core/database";
import { z } from "zod";
import { withResourceErrors } from "../errors.js";
import { principalOf, requireResourceId, resourceIdOf, type Principal } from "../principal.js";
import { deleted, resourceSet, singleResource } from "../responses.js";

const CalendarDateSchema = z
  .string()
  .refine((value) => CalendarDate.isValid(value), "must be a date as YYYY-MM-DD")
  .transform((value) => CalendarDate.parse(value));

const CreateDateTagSchema = z.object({
  date: CalendarDateSchema,
  tagId: z.number().int().positive(),
});

export interface DateTagsGroupDeps {
  dateTags: DateTagManager;
}

export function dateTagsGroup(deps: DateTagsGroupDeps): Group<Principal> {
  return new Group<Principal>({ urlPrefix: "date_tags", description: "Tags attached to dates" })
    .addEndpoint({
      urlSuffixes: [
        "date_tags",
        "date_tags/",
        "date_tags/(?<resourceDate>[0-9]{4}-[0-9]{2}-[0-9]{2})",
        "date_tags/(?<resourceId>[0-9]+)",
      ],
      httpMethods: ["GET"],
      name: "date_tags",
      description: "Retrieves all date tags, those of one date, or one by ID",
      authNeeded: true,
      authScopes: { GET: ["date_tags.retrieve"] },
      handler: (auth, match) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);

          const id = resourceIdOf(match);
          if (id !== undefined) {
            const [found] = deps.dateTags.list(user, { id });
            if (!found) {
              throw new ResourceNotFoundError(`Date tag with ID ${id} is not found.`);
            }
            return singleResource(found);
          }

          const rawDate = match.groups.resourceDate;
          if (rawDate === undefined) {
            return resourceSet(deps.dateTags.list(user));
          }
          if (!CalendarDate.isValid(rawDate)) {
            throw new InvalidInputError(`Invalid date: ${rawDate}`);
          }
          return resourceSet(deps.dateTags.list(user, { date: CalendarDate.parse(rawDate) }));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["date_tag"],
      httpMethods: ["POST"],
      name: "date_tag",
      description: "Attaches a tag to a date",
      authNeeded: true,
      authScopes: { POST: ["date_tags.create"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const body = readJsonBody(request, CreateDateTagSchema);
          return singleResource(deps.dateTags.create(user, body));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["date_tag/(?<resourceId>[0-9]+)"],
      httpMethods: ["DELETE"],
      name: "date_tag",
      description: "Deletes a date tag",
      authNeeded: true,
      authScopes: { DELETE: ["date_tags.delete"] },
      handler: (auth, match) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          deps.dateTags.delete(user, requireResourceId(match));
          return deleted();
        }),
    });
}
