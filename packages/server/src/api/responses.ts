import { ApiResponse, ResponseType } from "@my-app/rest-api";

export function resourceSet(data: readonly unknown[]): ApiResponse {
  return new ApiResponse(ResponseType.RESOURCE_SET, data);
}

export function singleResource(data: unknown): ApiResponse {
  return new ApiResponse(ResponseType.SINGLE_RESOURCE, data);
}

export function deleted(): ApiResponse {
  return singleResource({ deleted: true });
}
