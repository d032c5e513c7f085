import { Page, PaginationMeta } from './pagination';

export interface ApiSuccess<T> {
  success: true;
  message: string;
  data: T;
}

export interface ApiPaginated<T> extends ApiSuccess<T[]> {
  pagination: PaginationMeta;
}

export interface ApiErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export function ok<T>(data: T, message = 'Success'): ApiSuccess<T> {
  return { success: true, message, data };
}

export function paginated<T>(page: Page<T>, message = 'Success'): ApiPaginated<T> {
  return { success: true, message, data: page.items, pagination: page.pagination };
}
