import type { FastifyRequest } from "fastify";
import { mediaUrl } from "./urls.js";

export interface UserRow {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  is_subscribed: boolean;
}

export interface TagRow {
  id: number;
  name: string;
  color: string;
  slug: string;
}

export interface IngredientRow {
  id: number;
  name: string;
  measurement_unit: string;
}

export interface RecipeIngredientRow extends IngredientRow {
  amount: number;
}

export interface CompactRecipeRow {
  id: number;
  name: string;
  image: string;
  cooking_time: number;
}

export interface RecipeRow extends CompactRecipeRow {
  text: string;
  author: UserRow;
  tags: TagRow[] | null;
  ingredients: RecipeIngredientRow[] | null;
  is_favorited: boolean;
  is_in_shopping_cart: boolean;
}

export interface SubscriptionRow extends Omit<UserRow, "is_subscribed"> {
  recipes_count: number;
}

export function userPayload(row: UserRow) {
  return {
    email: row.email,
    id: row.id,
    username: row.username,
    first_name: row.first_name,
    last_name: row.last_name,
    is_subscribed: row.is_subscribed,
  };
}

export function tagPayload(row: TagRow) {
  return { id: row.id, name: row.name, color: row.color, slug: row.slug };
}

export function ingredientPayload(row: IngredientRow) {
  return { id: row.id, name: row.name, measurement_unit: row.measurement_unit };
}

export function compactRecipePayload(req: FastifyRequest, row: CompactRecipeRow) {
  return {
    id: row.id,
    name: row.name,
    image: mediaUrl(req, row.image),
    cooking_time: row.cooking_time,
  };
}

export function recipePayload(req: FastifyRequest, row: RecipeRow) {
  return {
    id: row.id,
    tags: (row.tags ?? []).map(tagPayload),
    author: userPayload(row.author),
    ingredients: (row.ingredients ?? []).map((ingredient) => ({
      id: ingredient.id,
      name: ingredient.name,
      measurement_unit: ingredient.measurement_unit,
      amount: ingredient.amount,
    })),
    is_favorited: row.is_favorited,
    is_in_shopping_cart: row.is_in_shopping_cart,
    name: row.name,
    image: mediaUrl(req, row.image),
    text: row.text,
    cooking_time: row.cooking_time,
  };
}

export function subscriptionPayload(req: FastifyRequest, row: SubscriptionRow, recipes: CompactRecipeRow[]) {
  return {
    email: row.email,
    id: row.id,
    username: row.username,
    first_name: row.first_name,
    last_name: row.last_name,
    is_subscribed: true,
    recipes: recipes.map((recipe) => compactRecipePayload(req, recipe)),
    recipes_count: row.recipes_count,
  };
}
