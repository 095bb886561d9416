import { query } from "./db.js";
import type { CompactRecipeRow, RecipeRow } from "./serializers.js";

/** Columns of a user as seen by the viewer bound to `viewerParam` (may be NULL). */
export function userColumns(alias: string, viewerParam: string): string {
  return `${alias}.id, ${alias}.email, ${alias}.username, ${alias}.first_name, ${alias}.last_name,
    EXISTS (
      SELECT 1 FROM follows f
      WHERE f.user_id = CAST(${viewerParam} AS integer) AND f.following_id = ${alias}.id
    ) AS is_subscribed`;
}

export function recipeSelect(viewerParam: string): string {
  return `SELECT
    r.id, r.name, r.image, r.text, r.cooking_time,
    json_build_object(
      'id', a.id,
      'email', a.email,
      'username', a.username,
      'first_name', a.first_name,
      'last_name', a.last_name,
      'is_subscribed', EXISTS (
        SELECT 1 FROM follows f
        WHERE f.user_id = CAST(${viewerParam} AS integer) AND f.following_id = a.id
      )
    ) AS author,
    (SELECT json_agg(json_build_object('id', t.id, 'name', t.name, 'color', t.color, 'slug', t.slug) ORDER BY t.id)
       FROM recipe_tags rt JOIN tags t ON t.id = rt.tag_id
      WHERE rt.recipe_id = r.id) AS tags,
    (SELECT json_agg(json_build_object(
         'id', i.id, 'name', i.name, 'measurement_unit', i.measurement_unit, 'amount', ri.amount
       ) ORDER BY ri.id)
       FROM recipe_ingredients ri JOIN ingredients i ON i.id = ri.ingredient_id
      WHERE ri.recipe_id = r.id) AS ingredients,
    EXISTS (
      SELECT 1 FROM favorites fv WHERE fv.recipe_id = r.id AND fv.user_id = CAST(${viewerParam} AS integer)
    ) AS is_favorited,
    EXISTS (
      SELECT 1 FROM shopping_carts sc WHERE sc.recipe_id = r.id AND sc.user_id = CAST(${viewerParam} AS integer)
    ) AS is_in_shopping_cart
  FROM recipes r
  JOIN users a ON a.id = r.author_id`;
}

export async function fetchRecipe(id: number, viewerId: number | null): Promise<RecipeRow | null> {
  const result = await query<RecipeRow>(`${recipeSelect("$1")} WHERE r.id = $2`, [viewerId, id]);
  return result.rows[0] ?? null;
}

export async function fetchCompactRecipe(id: number): Promise<CompactRecipeRow | null> {
  const result = await query<CompactRecipeRow>(
    "SELECT id, name, image, cooking_time FROM recipes WHERE id = $1",
    [id],
  );
  return result.rows[0] ?? null;
}

/**
 * Newest recipes of each author, at most `limit` per author when given.
 */
export async function fetchRecipesByAuthors(
  authorIds: number[],
  limit: number | null,
): Promise<Map<number, CompactRecipeRow[]>> {
  const byAuthor = new Map<number, CompactRecipeRow[]>();
  if (authorIds.length === 0) return byAuthor;

  const result = await query<CompactRecipeRow & { author_id: number }>(
    `SELECT id, name, image, cooking_time, author_id
     FROM (
       SELECT r.id, r.name, r.image, r.cooking_time, r.author_id,
              row_number() OVER (PARTITION BY r.author_id ORDER BY r.id DESC) AS position
       FROM recipes r
       WHERE r.author_id = ANY($1::int[])
     ) ranked
     WHERE CAST($2 AS integer) IS NULL OR position <= CAST($2 AS integer)
     ORDER BY author_id, id DESC`,
    [authorIds, limit],
  );

  for (const row of result.rows) {
    const recipes = byAuthor.get(row.author_id) ?? [];
    recipes.push({ id: row.id, name: row.name, image: row.image, cooking_time: row.cooking_time });
    byAuthor.set(row.author_id, recipes);
  }
  return byAuthor;
}
