import { deny, grant, type AuthorizeFunction } from "@my-app/rest-api";
import { isExpired, type ApiTokenManager } from "@my-app/core/database";
import { anyScopeGranted } from "@my-app/core/scopes";
import type { Principal } from "./principal.js";

/**
 * Accepts `Bearer` API tokens only. The token and its client must both be
 * enabled and unexpired, and the token must hold one of the scopes the
 * endpoint asks for.
 */
export function createTokenAuthorizer(
  tokens: ApiTokenManager,
  now: () => Date = () => new Date(),
): AuthorizeFunction<Principal> {
  return (credentials, scopes) => {
    if (credentials === null || credentials.scheme !== "bearer") {
      return deny<Principal>();
    }

    const found = tokens.findByToken(credentials.token);
    if (!found) return deny<Principal>();

    const { token, client, user } = found;
    const at = now();
    if (
      !token.enabled ||
      !client.enabled ||
      isExpired(token.expires, at) ||
      isExpired(client.expires, at)
    ) {
      return deny<Principal>();
    }

    if (!anyScopeGranted(scopes, token.scopes)) {
      return deny<Principal>();
    }

    return grant({ user, token });
  };
}
