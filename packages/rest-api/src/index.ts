export {
  deny,
  grant,
  parseAuthorizationHeader,
  type AuthCredentials,
  type Authorization,
  type AuthorizeFunction,
} from "./authorization.js";
export { readJsonBody } from "./body.js";
export { CalendarDate } from "./calendar-date.js";
export {
  Dispatcher,
  type DispatchRequest,
  type DispatchResult,
  type DispatcherOptions,
} from "./dispatcher.js";
export {
  createEndpoint,
  type Endpoint,
  type EndpointDescriptor,
  type EndpointHandler,
  type EndpointRequest,
  type EndpointScopes,
  type EndpointUrl,
  type UrlMatch,
} from "./endpoint.js";
export {
  defineEntity,
  entityFieldsOf,
  ENTITY_DESCRIPTOR,
  type Entity,
  type EntityDescriptor,
  type EntityFields,
} from "./entity.js";
export {
  EndpointRegistrationError,
  INTERNAL_ERROR_MESSAGE,
  InvalidInputError,
  ResourceError,
  ResourceForbiddenError,
  ResourceIntegrityError,
  ResourceNotFoundError,
  ResourceUnauthorizedError,
  RestApiError,
  SerializationError,
  ServerError,
  clientMessageFor,
  statusForErrorKind,
  type ResourceErrorKind,
} from "./errors.js";
export { Group, type GroupOptions } from "./group.js";
export { HTTP_METHODS, isHttpMethod, type HttpMethod } from "./http-method.js";
export {
  encodeResponse,
  encodeValue,
  formatDateTime,
  serializeResponse,
  type JsonObject,
  type JsonValue,
} from "./json-encoder.js";
export {
  DEFAULT_PAGE_LIMIT,
  paginate,
  readPagination,
  type Page,
  type PaginationInput,
} from "./pagination.js";
export { ApiResponse, ResponseType } from "./response.js";
export { RouteCache, type ResolvedRoute } from "./route-cache.js";
