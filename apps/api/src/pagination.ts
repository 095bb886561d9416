import type { FastifyRequest } from "fastify";
import { firstValue, type QueryValue } from "./query-values.js";
import { requestUrl } from "./urls.js";

export const DEFAULT_PAGE_SIZE = 6;
export const MAX_PAGE_SIZE = 100;

export interface PageQuery {
  page?: QueryValue;
  limit?: QueryValue;
}

export interface PageParams {
  page: number;
  limit: number;
  offset: number;
}

export interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

function positiveInt(raw: QueryValue | undefined): number | null {
  const text = firstValue(raw)?.trim();
  if (text === undefined || !/^\d+$/.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

export function parsePageParams(query: PageQuery, defaultLimit = DEFAULT_PAGE_SIZE): PageParams {
  const page = positiveInt(query.page) ?? 1;
  const limit = Math.min(positiveInt(query.limit) ?? defaultLimit, MAX_PAGE_SIZE);
  return { page, limit, offset: (page - 1) * limit };
}

/** Page 1 always exists, even when empty. */
export function isPageOutOfRange(params: PageParams, count: number): boolean {
  return params.page > 1 && params.offset >= count;
}

function pageLink(req: FastifyRequest, page: number): string {
  const url = requestUrl(req);
  if (page === 1) {
    url.searchParams.delete("page");
  } else {
    url.searchParams.set("page", String(page));
  }
  return url.toString();
}

export function buildPage<T>(req: FastifyRequest, params: PageParams, count: number, results: T[]): Page<T> {
  const hasNext = params.offset + params.limit < count;
  return {
    count,
    next: hasNext ? pageLink(req, params.page + 1) : null,
    previous: params.page > 1 ? pageLink(req, params.page - 1) : null,
    results,
  };
}
