import { decodeImageDataUrl, type DecodedImage } from "./media.js";
import { ValidationError, integerInRange, requiredText } from "./validation.js";

export const RECIPE_NAME_MAX_LENGTH = 200;
export const MIN_SMALL_INT = 1;
export const MAX_SMALL_INT = 32767;

export interface RecipeBody {
  name?: unknown;
  text?: unknown;
  cooking_time?: unknown;
  image?: unknown;
  tags?: unknown;
  ingredients?: unknown;
}

export interface IngredientAmount {
  id: number;
  amount: number;
}

export interface RecipeInput {
  name: string;
  text: string;
  cookingTime: number;
  image: DecodedImage;
  tags: number[];
  ingredients: IngredientAmount[];
}

export type RecipePatch = Partial<RecipeInput>;

function parseImage(value: unknown): DecodedImage {
  const image = decodeImageDataUrl(value);
  if (!image) throw new ValidationError("image must be a base64 data:image URL");
  return image;
}

function parseTags(value: unknown): number[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError("tags must contain at least one tag");
  }
  const ids = value.map((item) => integerInRange(item, "tags", 1, 2_147_483_647));
  if (new Set(ids).size !== ids.length) throw new ValidationError("tags must not repeat");
  return ids;
}

function parseIngredients(value: unknown): IngredientAmount[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError("ingredients must contain at least one ingredient");
  }
  const items = value.map((item: unknown): IngredientAmount => {
    if (typeof item !== "object" || item === null) {
      throw new ValidationError("ingredients must be objects with id and amount");
    }
    const entry: { id?: unknown; amount?: unknown } = item;
    return {
      id: integerInRange(entry.id, "ingredients.id", 1, 2_147_483_647),
      amount: integerInRange(entry.amount, "amount", MIN_SMALL_INT, MAX_SMALL_INT),
    };
  });
  if (new Set(items.map((item) => item.id)).size !== items.length) {
    throw new ValidationError("ingredients must not repeat");
  }
  return items;
}

export function parseRecipeCreate(body: RecipeBody): RecipeInput {
  if (body.image === undefined || body.image === null || body.image === "") {
    throw new ValidationError("image is required");
  }
  return {
    name: requiredText(body.name, "name", RECIPE_NAME_MAX_LENGTH),
    text: requiredText(body.text, "text"),
    cookingTime: integerInRange(body.cooking_time, "cooking_time", MIN_SMALL_INT, MAX_SMALL_INT),
    image: parseImage(body.image),
    tags: parseTags(body.tags),
    ingredients: parseIngredients(body.ingredients),
  };
}

/** Only the fields present in the body are validated and returned. */
export function parseRecipePatch(body: RecipeBody): RecipePatch {
  const patch: RecipePatch = {};
  if (body.name !== undefined) patch.name = requiredText(body.name, "name", RECIPE_NAME_MAX_LENGTH);
  if (body.text !== undefined) patch.text = requiredText(body.text, "text");
  if (body.cooking_time !== undefined) {
    patch.cookingTime = integerInRange(body.cooking_time, "cooking_time", MIN_SMALL_INT, MAX_SMALL_INT);
  }
  if (body.image !== undefined && body.image !== null && body.image !== "") patch.image = parseImage(body.image);
  if (body.tags !== undefined) patch.tags = parseTags(body.tags);
  if (body.ingredients !== undefined) patch.ingredients = parseIngredients(body.ingredients);
  return patch;
}
