export interface ShoppingListLine {
  name: string;
  measurement_unit: string;
  amount: number;
}

export function shoppingListFilename(username: string): string {
  return `${username}_shopping_list.txt`;
}

/**
 * Builds a `Content-Disposition` value. Header values must stay ASCII, so a
 * name outside it gets an ASCII fallback plus the RFC 5987 `filename*` form.
 */
export function attachmentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  if (fallback === filename) return `attachment; filename="${filename}"`;
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

/** One `- name (unit) - amount` line per ingredient, sorted by name then unit. */
export function formatShoppingList(lines: ShoppingListLine[]): string {
  return [...lines]
    .sort((a, b) => a.name.localeCompare(b.name) || a.measurement_unit.localeCompare(b.measurement_unit))
    .map((line) => `- ${line.name} (${line.measurement_unit}) - ${line.amount}`)
    .join("\n");
}
