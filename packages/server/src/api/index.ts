import { Dispatcher, type EndpointUrl, type RouteCache } from "@my-app/rest-api";
import type { Managers } from "@my-app/core/database";
import type { Logger } from "pino";
import { createTokenAuthorizer } from "./authorizer.js";
import { apiClientsGroup } from "./groups/api-clients.js";
import { apiTokensGroup } from "./groups/api-tokens.js";
import { apiGroup } from "./groups/api.js";
import { dateTagsGroup } from "./groups/date-tags.js";
import { notesGroup } from "./groups/notes.js";
import { tagsGroup } from "./groups/tags.js";
import { usersGroup } from "./groups/users.js";
import { webUiSettingsGroup } from "./groups/web-ui-settings.js";
import type { Principal } from "./principal.js";

export { createTokenAuthorizer } from "./authorizer.js";
export { toResourceError, withResourceErrors } from "./errors.js";
export { principalOf, resourceIdOf, requireResourceId, type Principal } from "./principal.js";

export interface RestApiDeps {
  managers: Managers;
  logger: Logger;
  defaultLimit?: number;
  cache?: RouteCache<Principal>;
  /** Clock for token expiry checks. */
  now?: () => Date;
}

/** The v1 API: every group, behind API token authorization. */
export function createRestApi(deps: RestApiDeps): Dispatcher<Principal> {
  const { managers } = deps;

  return new Dispatcher<Principal>({
    logger: deps.logger,
    authorize: createTokenAuthorizer(managers.apiTokens, deps.now),
    defaultLimit: deps.defaultLimit,
    cache: deps.cache,
  })
    .registerGroup(apiGroup())
    .registerGroup(usersGroup({ users: managers.users }))
    .registerGroup(tagsGroup({ tags: managers.tags }))
    .registerGroup(dateTagsGroup({ dateTags: managers.dateTags }))
    .registerGroup(notesGroup({ notes: managers.notes }))
    .registerGroup(webUiSettingsGroup({ webUiSettings: managers.webUiSettings }))
    .registerGroup(apiClientsGroup({ apiClients: managers.apiClients }))
    .registerGroup(apiTokensGroup({ apiTokens: managers.apiTokens }));
}

/** Every scope some endpoint asks for, sorted. */
export function requiredScopes<P>(endpoints: readonly EndpointUrl<P>[]): string[] {
  const scopes = new Set<string>();
  for (const { endpoint } of endpoints) {
    for (const listed of Object.values(endpoint.authScopes)) {
      for (const scope of listed ?? []) scopes.add(scope);
    }
  }
  return [...scopes].sort();
}
