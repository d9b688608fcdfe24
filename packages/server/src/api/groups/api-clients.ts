import { Group, readJsonBody } from "@my-app/rest-api";
import type { ApiClientManager } from "@my-app/core/database";
import { z } from "zod";
import { withResourceErrors } from "../errors.js";
import { principalOf, requireResourceId, resourceIdOf, type Principal } from "../principal.js";
import { deleted, resourceSet, singleResource } from "../responses.js";
import { ExpiresSchema } from "./expires.js";

const AppNameSchema = z.string().trim().min(1).max(64);

const CreateApiClientSchema = z.object({
  appName: AppNameSchema,
  appPublisher: AppNameSchema,
  expires: ExpiresSchema,
});

const UpdateApiClientSchema = z
  .strictObject({
    appName: AppNameSchema.optional(),
    appPublisher: AppNameSchema.optional(),
    enabled: z.boolean().optional(),
    expires: ExpiresSchema,
  })
  .refine((changes) => Object.keys(changes).length > 0, "nothing to update");

export interface ApiClientsGroupDeps {
  apiClients: ApiClientManager;
}

export function apiClientsGroup(deps: ApiClientsGroupDeps): Group<Principal> {
  return new Group<Principal>({
    urlPrefix: "api_clients",
    description: "Applications allowed to request API tokens",
  })
    .addEndpoint({
      urlSuffixes: ["api_clients", "api_clients/", "api_clients/(?<resourceId>[0-9]+)"],
      httpMethods: ["GET"],
      name: "api_clients",
      description: "Retrieves the token owner's API clients, or one by ID",
      authNeeded: true,
      authScopes: { GET: ["api_clients.retrieve"] },
      handler: (auth, match) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = resourceIdOf(match);
          return id === undefined
            ? resourceSet(deps.apiClients.list(user))
            : singleResource(deps.apiClients.get(user, id));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["api_client"],
      httpMethods: ["POST"],
      name: "api_client",
      description: "Registers an API client",
      authNeeded: true,
      authScopes: { POST: ["api_clients.create"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const body = readJsonBody(request, CreateApiClientSchema);
          return singleResource(deps.apiClients.create(user, body));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["api_client/(?<resourceId>[0-9]+)"],
      httpMethods: ["PATCH", "DELETE"],
      name: "api_client",
      description: "Updates an API client, or deletes it with its tokens",
      authNeeded: true,
      authScopes: { PATCH: ["api_clients.update"], DELETE: ["api_clients.delete"] },
      handler: (auth, match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = requireResourceId(match);
          if (request.method === "DELETE") {
            deps.apiClients.delete(user, id);
            return deleted();
          }
          const changes = readJsonBody(request, UpdateApiClientSchema);
          return singleResource(deps.apiClients.update(user, id, changes));
        }),
    });
}
