import { Group, ResourceNotFoundError, readJsonBody } from "@my-app/rest-api";
import type { ApiTokenManager } from "@my-app/core/database";
import { ScopePatternSchema } from "@my-app/core/scopes";
import { z } from "zod";
import { withResourceErrors } from "../errors.js";
import { principalOf, requireResourceId, resourceIdOf, type Principal } from "../principal.js";
import { deleted, resourceSet, singleResource } from "../responses.js";
import { ExpiresSchema } from "./expires.js";

const CreateApiTokenSchema = z.object({
  clientId: z.number().int().positive(),
  scopes: z.array(ScopePatternSchema).min(1),
  expires: ExpiresSchema,
});

const UpdateApiTokenSchema = z
  .strictObject({
    enabled: z.boolean().optional(),
    expires: ExpiresSchema,
  })
  .refine((changes) => Object.keys(changes).length > 0, "nothing to update");

export interface ApiTokensGroupDeps {
  apiTokens: ApiTokenManager;
}

export function apiTokensGroup(deps: ApiTokensGroupDeps): Group<Principal> {
  return new Group<Principal>({
    urlPrefix: "api_tokens",
    description: "Scoped tokens that authorize API requests",
  })
    .addEndpoint({
      urlSuffixes: ["api_tokens", "api_tokens/", "api_tokens/(?<resourceId>[0-9]+)"],
      httpMethods: ["GET"],
      name: "api_tokens",
      description: "Retrieves the token owner's API tokens, without their secrets",
      authNeeded: true,
      authScopes: { GET: ["api_tokens.retrieve"] },
      handler: (auth, match) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = resourceIdOf(match);
          if (id === undefined) {
            return resourceSet(deps.apiTokens.list(user));
          }
          const [found] = deps.apiTokens.list(user, { id });
          if (!found) {
            throw new ResourceNotFoundError(`API token with ID ${id} is not found.`);
          }
          return singleResource(found);
        }),
    })
    .addEndpoint({
      urlSuffixes: ["api_token"],
      httpMethods: ["POST"],
      name: "api_token",
      description:
        "Creates a token with scopes the calling token holds; its secret is only returned here",
      authNeeded: true,
      authScopes: { POST: ["api_tokens.create"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user, token } = principalOf(auth);
          const body = readJsonBody(request, CreateApiTokenSchema);
          return singleResource(
            deps.apiTokens.create(user, { ...body, grantedBy: token.scopes }),
          );
        }),
    })
    .addEndpoint({
      urlSuffixes: ["api_token/(?<resourceId>[0-9]+)"],
      httpMethods: ["PATCH", "DELETE"],
      name: "api_token",
      description: "Enables, disables, re-dates or revokes an API token",
      authNeeded: true,
      authScopes: { PATCH: ["api_tokens.update"], DELETE: ["api_tokens.delete"] },
      handler: (auth, match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = requireResourceId(match);
          if (request.method === "DELETE") {
            deps.apiTokens.delete(user, id);
            return deleted();
          }
          const changes = readJsonBody(request, UpdateApiTokenSchema);
          return singleResource(deps.apiTokens.update(user, id, changes));
        }),
    });
}
