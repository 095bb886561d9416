import type { AuthUser } from "../../../src/auth.js";
import type { RecipeRow, TagRow } from "../../../src/serializers.js";

export const FIXTURE_NOW = "2025-01-01T12:00:00.000Z";

export const AUTHOR_TOKEN = "token-author";
export const READER_TOKEN = "token-reader";
export const STAFF_TOKEN = "token-staff";

export const AUTHOR: AuthUser = {
  id: 1,
  email: "author@example.com",
  username: "author",
  firstName: "Anna",
  lastName: "Cook",
  isStaff: false,
  token: AUTHOR_TOKEN,
};

export const READER: AuthUser = {
  id: 2,
  email: "reader@example.com",
  username: "reader",
  firstName: "Rick",
  lastName: "Reader",
  isStaff: false,
  token: READER_TOKEN,
};

export const STAFF: AuthUser = {
  id: 3,
  email: "staff@example.com",
  username: "staff",
  firstName: "Sam",
  lastName: "Staff",
  isStaff: true,
  token: STAFF_TOKEN,
};

export const BREAKFAST: TagRow = { id: 1, name: "Breakfast", color: "#E26C2D", slug: "breakfast" };
export const DINNER: TagRow = { id: 2, name: "Dinner", color: "#49B64E", slug: "dinner" };

export const OATS = { id: 10, name: "oats", measurement_unit: "g" };
export const MILK = { id: 11, name: "milk", measurement_unit: "ml" };

/** A 1x1 transparent PNG. */
export const PNG_DATA_URL =
  "data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=";

export function recipeRow(overrides: Partial<RecipeRow> = {}): RecipeRow {
  return {
    id: 5,
    name: "Porridge",
    image: "recipes/images/porridge.png",
    text: "Boil the oats in milk.",
    cooking_time: 10,
    author: {
      id: AUTHOR.id,
      email: AUTHOR.email,
      username: AUTHOR.username,
      first_name: AUTHOR.firstName,
      last_name: AUTHOR.lastName,
      is_subscribed: false,
    },
    tags: [BREAKFAST],
    ingredients: [
      { ...OATS, amount: 80 },
      { ...MILK, amount: 200 },
    ],
    is_favorited: false,
    is_in_shopping_cart: false,
    ...overrides,
  };
}
