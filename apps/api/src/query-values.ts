/** A querystring field; repeating it (`?page=1&page=2`) yields an array. */
export type QueryValue = string | string[];

export function firstValue(raw: QueryValue | undefined): string | undefined {
  return Array.isArray(raw) ? raw[0] : raw;
}

export function allValues(raw: QueryValue | undefined): string[] {
  if (raw === undefined) return [];
  return Array.isArray(raw) ? raw : [raw];
}
