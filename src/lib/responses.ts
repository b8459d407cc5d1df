import type { PaginationInfo, PaginationParams } from './pagination.js';

export interface PaginatedResponse<T> extends PaginationInfo {
  items: T[];
}

export interface DataResponse<T> {
  success: true;
  data: T;
}

export interface SuccessResponse {
  success: true;
  message: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  detail?: string;
  code?: string;
}

export function paginatedResponse<T>(items: T[], info: PaginationInfo): PaginatedResponse<T> {
  return { items, ...info };
}

export function paginate<T>(
  params: PaginationParams,
  items: T[],
  totalItems: number,
): PaginatedResponse<T> {
  return paginatedResponse(items, params.getPaginationInfo(totalItems));
}

export const dataResponse = <T>(data: T): DataResponse<T> => ({ success: true, data });

export const successResponse = (message: string): SuccessResponse => ({
  success: true,
  message,
});

export function errorResponse(error: string, detail?: string, code?: string): ErrorResponse {
  const response: ErrorResponse = { success: false, error };
  if (detail) {
    response.detail = detail;
  }
  if (code) {
    response.code = code;
  }
  return response;
}
