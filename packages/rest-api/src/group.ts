import {
  createEndpoint,
  type Endpoint,
  type EndpointDescriptor,
  type EndpointUrl,
} from "./endpoint.js";

export interface GroupOptions {
  /** URL prefix for the group; a trailing slash is added when missing. */
  urlPrefix: string;
  /** Defaults to the URL prefix. */
  name?: string;
  description?: string;
}

/**
 * A set of endpoints, and nested groups, that share a URL prefix.
 *
 * ```ts
 * const tags = new Group({ urlPrefix: "tags" }).addEndpoint({
 *   urlSuffixes: ["tags", "tags/"],
 *   httpMethods: ["GET"],
 *   handler: () => new ApiResponse(ResponseType.RESOURCE_SET, []),
 * });
 * tags.getEndpoints().map((e) => e.url); // ["tags/tags", "tags/tags/"]
 * ```
 */
export class Group<P = unknown> {
  readonly urlPrefix: string;
  readonly name: string;
  readonly description: string;

  private readonly endpoints: Endpoint<P>[] = [];
  private readonly subgroups: Group<P>[] = [];

  constructor(options: GroupOptions) {
    const { urlPrefix } = options;
    this.urlPrefix =
      urlPrefix === "" || urlPrefix.endsWith("/") ? urlPrefix : `${urlPrefix}/`;
    this.name = options.name ?? urlPrefix;
    this.description = options.description ?? "";
  }

  addEndpoint(descriptor: EndpointDescriptor<P>): this {
    this.endpoints.push(createEndpoint(descriptor));
    return this;
  }

  addSubgroup(group: Group<P>): this {
    this.subgroups.push(group);
    return this;
  }

  /**
   * Flattens the group into one entry per endpoint URL suffix, local
   * endpoints first, then those of each subgroup under this prefix.
   */
  getEndpoints(): EndpointUrl<P>[] {
    const local = this.endpoints.flatMap((endpoint) =>
      endpoint.urlSuffixes.map((suffix) => ({
        url: `${this.urlPrefix}${suffix}`,
        endpoint,
      })),
    );

    const nested = this.subgroups.flatMap((group) =>
      group.getEndpoints().map((entry) => ({
        url: `${this.urlPrefix}${entry.url}`,
        endpoint: entry.endpoint,
      })),
    );

    return [...local, ...nested];
  }
}
