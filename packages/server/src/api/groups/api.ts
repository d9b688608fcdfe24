import { Group } from "@my-app/rest-api";
import type { Principal } from "../principal.js";
import { singleResource } from "../responses.js";

export function apiGroup(): Group<Principal> {
  return new Group<Principal>({
    urlPrefix: "api",
    description: "Generic API requests",
  }).addEndpoint({
    urlSuffixes: ["ping", "ping/"],
    httpMethods: ["GET"],
    name: "ping",
    description: "Checks that the service is available",
    authNeeded: true,
    authScopes: { GET: ["api.ping"] },
    handler: () => singleResource({ ping: "pong" }),
  });
}
