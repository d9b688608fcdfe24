import {
  ResourceNotFoundError,
  ResourceUnauthorizedError,
  type Authorization,
  type UrlMatch,
} from "@my-app/rest-api";
import type { ApiToken, User } from "@my-app/core/database";

/** Who a request acts for: the owner of the presented API token. */
export interface Principal {
  user: User;
  token: ApiToken;
}

export function principalOf(auth: Authorization<Principal> | null): Principal {
  if (!auth?.data) {
    throw new ResourceUnauthorizedError();
  }
  return auth.data;
}

/** The `resourceId` capture of the URL, if the endpoint matched one. */
export function resourceIdOf(match: UrlMatch): number | undefined {
  const raw = match.groups.resourceId;
  if (raw === undefined) return undefined;
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new ResourceNotFoundError(`Resource ID ${raw} is not valid`);
  }
  return id;
}

export function requireResourceId(match: UrlMatch): number {
  const id = resourceIdOf(match);
  if (id === undefined) {
    throw new ResourceNotFoundError();
  }
  return id;
}
