/**
 * The shape of an endpoint result. Handlers create one per request; the
 * dispatcher fills in pagination and runtime before it is encoded.
 */

export const ResponseType = {
  ERROR: 1,
  RESOURCE_SET: 2,
  SINGLE_RESOURCE: 3,
} as const;

export type ResponseType = (typeof ResponseType)[keyof typeof ResponseType];

export class ApiResponse {
  type: ResponseType;
  success = true;
  data: unknown;

  errorCode = 0;
  errorMessage: string | null = null;

  /** Only honoured for RESOURCE_SET responses whose data is an array. */
  paginate = true;
  page = 0;
  limit = 0;
  totalItems = 0;
  lastPage = 0;

  /** Milliseconds spent in dispatch. */
  runtime = 0;

  constructor(type: ResponseType = ResponseType.RESOURCE_SET, data: unknown = null) {
    this.type = type;
    this.data = data;
  }

  static error(code: number, message: string): ApiResponse {
    const response = new ApiResponse(ResponseType.ERROR);
    response.success = false;
    response.errorCode = code;
    response.errorMessage = message;
    response.paginate = false;
    return response;
  }
}
