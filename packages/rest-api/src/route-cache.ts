import type { Endpoint, UrlMatch } from "./endpoint.js";

export interface ResolvedRoute<P = unknown> {
  url: string;
  endpoint: Endpoint<P>;
  match: UrlMatch;
}

/**
 * Path → resolved route. Filled on first resolution of a path and never
 * evicted: route tables do not change once the dispatcher serves.
 */
export class RouteCache<P = unknown> {
  private readonly entries = new Map<string, ResolvedRoute<P>>();

  get(path: string): ResolvedRoute<P> | undefined {
    return this.entries.get(path);
  }

  set(path: string, route: ResolvedRoute<P>): void {
    this.entries.set(path, route);
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  get size(): number {
    return this.entries.size;
  }
}
