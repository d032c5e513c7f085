/**
 * Dental Clinic API - Pagination
 *
 * Page-number pagination with relative next/previous links.
 */

import { NotFoundException } from '@nestjs/common';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export class PageQueryDto {
  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page: number = 1;

  @ApiPropertyOptional({ default: DEFAULT_PAGE_SIZE, minimum: 1, maximum: MAX_PAGE_SIZE })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  pageSize: number = DEFAULT_PAGE_SIZE;
}

export interface PageRequest {
  page: number;
  pageSize: number;
  /** Request path and query string, used to build next/previous links. */
  url: string;
}

export interface PaginationMeta {
  count: number;
  next: string | null;
  previous: string | null;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface Page<T> {
  items: T[];
  pagination: PaginationMeta;
}

export function totalPagesFor(count: number, pageSize: number): number {
  return Math.max(1, Math.ceil(count / pageSize));
}

export function pageWindow(request: Pick<PageRequest, 'page' | 'pageSize'>): { skip: number; take: number } {
  return { skip: (request.page - 1) * request.pageSize, take: request.pageSize };
}

/**
 * Link to another page of the same listing. Page 1 drops the `page`
 * parameter altogether.
 */
export function pageLink(url: string, page: number): string {
  const parsed = new URL(url, 'http://localhost');
  if (page <= 1) {
    parsed.searchParams.delete('page');
  } else {
    parsed.searchParams.set('page', String(page));
  }
  return `${parsed.pathname}${parsed.search}`;
}

export function buildPage<T>(items: T[], count: number, request: PageRequest): Page<T> {
  const totalPages = totalPagesFor(count, request.pageSize);
  if (request.page > totalPages) {
    throw new NotFoundException({ code: 'not_found', message: 'Invalid page.' });
  }

  return {
    items,
    pagination: {
      count,
      next: request.page < totalPages ? pageLink(request.url, request.page + 1) : null,
      previous: request.page > 1 ? pageLink(request.url, request.page - 1) : null,
      page: request.page,
      pageSize: request.pageSize,
      totalPages,
    },
  };
}

export function emptyPage<T>(request: PageRequest): Page<T> {
  return buildPage<T>([], 0, request);
}
