export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!(err instanceof Error) || !("code" in err) || err.code !== "23505") return false;
  if (constraint === undefined) return true;
  return "constraint" in err && err.constraint === constraint;
}
