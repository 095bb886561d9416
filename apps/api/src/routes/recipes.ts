import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { PoolClient } from "pg";
import type { AuthUser } from "../auth.js";
import { query } from "../db.js";
import { removeMediaFile, saveRecipeImage } from "../media.js";
import { buildPage, isPageOutOfRange, parsePageParams, type PageQuery } from "../pagination.js";
import { isUniqueViolation } from "../pg-errors.js";
import { unauthorized } from "../problem.js";
import { fetchCompactRecipe, fetchRecipe, recipeSelect } from "../queries.js";
import {
  parseRecipeCreate,
  parseRecipePatch,
  type IngredientAmount,
  type RecipeBody,
  type RecipeInput,
  type RecipePatch,
} from "../recipe-input.js";
import { allValues, firstValue, type QueryValue } from "../query-values.js";
import { getOptionalViewer, parseId, requireAuthUser } from "../request-auth.js";
import { compactRecipePayload, recipePayload, type RecipeRow } from "../serializers.js";
import {
  attachmentDisposition,
  formatShoppingList,
  shoppingListFilename,
  type ShoppingListLine,
} from "../shopping-list.js";
import { SqlParams, whereClause } from "../sql.js";
import { withTransaction } from "../transaction.js";
import { ValidationError } from "../validation.js";

interface RecipeListQuery extends PageQuery {
  author?: QueryValue;
  tags?: QueryValue;
  is_favorited?: QueryValue;
  is_in_shopping_cart?: QueryValue;
}

interface RecipeFilters {
  author: number | null;
  tags: string[];
  favorited: boolean | null;
  inShoppingCart: boolean | null;
}

interface RecipeOwnerRow {
  author_id: number;
  image: string;
}

const DUPLICATE_RECIPE = "A recipe with this name and text already exists";

function parseFlag(raw: QueryValue | undefined, field: string): boolean | null {
  const value = firstValue(raw)?.trim();
  if (value === undefined || value === "") return null;
  if (value === "1") return true;
  if (value === "0") return false;
  throw new ValidationError(`${field} must be 0 or 1`);
}

function parseFilters(query: RecipeListQuery): RecipeFilters {
  const rawAuthor = firstValue(query.author)?.trim();
  let author: number | null = null;
  if (rawAuthor) {
    author = parseId(rawAuthor);
    if (author === null) throw new ValidationError("author must be a user id");
  }

  return {
    author,
    tags: allValues(query.tags).map((tag) => tag.trim()).filter((tag) => tag.length > 0),
    favorited: parseFlag(query.is_favorited, "is_favorited"),
    inShoppingCart: parseFlag(query.is_in_shopping_cart, "is_in_shopping_cart"),
  };
}

function filterConditions(params: SqlParams, filters: RecipeFilters, viewerId: number | null): string[] {
  const conditions: string[] = [];
  if (filters.author !== null) {
    conditions.push(`r.author_id = ${params.add(filters.author)}`);
  }
  if (filters.tags.length > 0) {
    conditions.push(`EXISTS (
      SELECT 1 FROM recipe_tags rt JOIN tags t ON t.id = rt.tag_id
      WHERE rt.recipe_id = r.id AND t.slug = ANY(${params.add(filters.tags)}::text[])
    )`);
  }
  if (filters.favorited !== null) {
    conditions.push(`${filters.favorited ? "" : "NOT "}EXISTS (
      SELECT 1 FROM favorites fv WHERE fv.recipe_id = r.id AND fv.user_id = ${params.add(viewerId)}
    )`);
  }
  if (filters.inShoppingCart !== null) {
    conditions.push(`${filters.inShoppingCart ? "" : "NOT "}EXISTS (
      SELECT 1 FROM shopping_carts sc WHERE sc.recipe_id = r.id AND sc.user_id = ${params.add(viewerId)}
    )`);
  }
  return conditions;
}

/** Returns an error message naming the first tag or ingredient ids that do not exist. */
async function findUnknownReference(
  tags: number[] | undefined,
  ingredients: IngredientAmount[] | undefined,
): Promise<string | null> {
  if (tags) {
    const result = await query<{ id: number }>("SELECT id FROM tags WHERE id = ANY($1::int[])", [tags]);
    const found = new Set(result.rows.map((row) => row.id));
    const missing = tags.filter((id) => !found.has(id));
    if (missing.length > 0) return `Unknown tags: ${missing.join(", ")}`;
  }
  if (ingredients) {
    const ids = ingredients.map((item) => item.id);
    const result = await query<{ id: number }>("SELECT id FROM ingredients WHERE id = ANY($1::int[])", [ids]);
    const found = new Set(result.rows.map((row) => row.id));
    const missing = ids.filter((id) => !found.has(id));
    if (missing.length > 0) return `Unknown ingredients: ${missing.join(", ")}`;
  }
  return null;
}

async function replaceTags(client: PoolClient, recipeId: number, tags: number[]) {
  await client.query("DELETE FROM recipe_tags WHERE recipe_id = $1", [recipeId]);
  await client.query(
    "INSERT INTO recipe_tags (recipe_id, tag_id) SELECT $1, unnest($2::int[])",
    [recipeId, tags],
  );
}

async function replaceIngredients(client: PoolClient, recipeId: number, ingredients: IngredientAmount[]) {
  await client.query("DELETE FROM recipe_ingredients WHERE recipe_id = $1", [recipeId]);
  await client.query(
    `INSERT INTO recipe_ingredients (recipe_id, ingredient_id, amount)
     SELECT $1, ingredient_id, amount FROM unnest($2::int[], $3::int[]) AS items (ingredient_id, amount)`,
    [recipeId, ingredients.map((item) => item.id), ingredients.map((item) => item.amount)],
  );
}

async function discardImage(req: FastifyRequest, root: string, relPath: string) {
  try {
    await removeMediaFile(root, relPath);
  } catch (err: unknown) {
    req.log.warn({ err, image: relPath }, "Failed to remove recipe image");
  }
}

async function loadOwnedRecipe(
  rawId: string,
  reply: FastifyReply,
  user: AuthUser,
): Promise<(RecipeOwnerRow & { id: number }) | null> {
  const id = parseId(rawId);
  const result = id === null
    ? null
    : await query<RecipeOwnerRow>("SELECT author_id, image FROM recipes WHERE id = $1", [id]);
  const row = result?.rows[0];
  if (id === null || !row) {
    reply.code(404).send({ error: "Recipe not found" });
    return null;
  }
  if (row.author_id !== user.id && !user.isStaff) {
    reply.code(403).send({ error: "Only the author can change this recipe" });
    return null;
  }
  return { id, ...row };
}

interface RecipeRelation {
  path: string;
  table: "favorites" | "shopping_carts";
  constraint: string;
  alreadyAdded: string;
  notAdded: string;
}

const RELATIONS: RecipeRelation[] = [
  {
    path: "/recipes/:id/favorite/",
    table: "favorites",
    constraint: "favorites_user_recipe_key",
    alreadyAdded: "Recipe is already in favorites",
    notAdded: "Recipe is not in favorites",
  },
  {
    path: "/recipes/:id/shopping_cart/",
    table: "shopping_carts",
    constraint: "shopping_carts_user_recipe_key",
    alreadyAdded: "Recipe is already in the shopping cart",
    notAdded: "Recipe is not in the shopping cart",
  },
];

export interface RecipeRoutesOptions {
  mediaRoot: string;
}

export async function recipeRoutes(app: FastifyInstance, opts: RecipeRoutesOptions) {
  const { mediaRoot } = opts;

  app.get<{ Querystring: RecipeListQuery }>("/recipes/", async (req, reply) => {
    const viewer = await getOptionalViewer(req, reply);
    if (viewer === undefined) return;

    let filters: RecipeFilters;
    try {
      filters = parseFilters(req.query);
    } catch (err) {
      if (err instanceof ValidationError) return reply.code(400).send({ error: err.message });
      throw err;
    }
    if (!viewer && (filters.favorited !== null || filters.inShoppingCart !== null)) {
      return unauthorized(reply, req.url);
    }
    const viewerId = viewer?.id ?? null;

    const page = parsePageParams(req.query);
    const countParams = new SqlParams();
    const countWhere = whereClause(filterConditions(countParams, filters, viewerId));
    const countResult = await query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM recipes r ${countWhere}`,
      countParams.values,
    );
    const count = countResult.rows[0]?.count ?? 0;
    if (isPageOutOfRange(page, count)) {
      return reply.code(404).send({ error: "Invalid page" });
    }

    const listParams = new SqlParams();
    const viewerParam = listParams.add(viewerId);
    const listWhere = whereClause(filterConditions(listParams, filters, viewerId));
    const result = await query<RecipeRow>(
      `${recipeSelect(viewerParam)}
       ${listWhere}
       ORDER BY r.id DESC
       LIMIT ${listParams.add(page.limit)} OFFSET ${listParams.add(page.offset)}`,
      listParams.values,
    );

    return buildPage(req, page, count, result.rows.map((row) => recipePayload(req, row)));
  });

  app.get("/recipes/download_shopping_cart/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    const result = await query<ShoppingListLine>(
      `SELECT i.name, i.measurement_unit, SUM(ri.amount)::int AS amount
       FROM shopping_carts sc
       JOIN recipe_ingredients ri ON ri.recipe_id = sc.recipe_id
       JOIN ingredients i ON i.id = ri.ingredient_id
       WHERE sc.user_id = $1
       GROUP BY i.name, i.measurement_unit
       ORDER BY i.name, i.measurement_unit`,
      [authUser.id],
    );
    if (result.rows.length === 0) {
      return reply.code(400).send({ error: "Shopping cart is empty" });
    }

    return reply
      .type("text/plain; charset=utf-8")
      .header("content-disposition", attachmentDisposition(shoppingListFilename(authUser.username)))
      .send(formatShoppingList(result.rows));
  });

  app.get<{ Params: { id: string } }>("/recipes/:id/", async (req, reply) => {
    const viewer = await getOptionalViewer(req, reply);
    if (viewer === undefined) return;

    const id = parseId(req.params.id);
    const row = id === null ? null : await fetchRecipe(id, viewer?.id ?? null);
    if (!row) return reply.code(404).send({ error: "Recipe not found" });
    return recipePayload(req, row);
  });

  app.post<{ Body: RecipeBody | undefined }>("/recipes/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    let input: RecipeInput;
    try {
      input = parseRecipeCreate(req.body ?? {});
    } catch (err) {
      if (err instanceof ValidationError) return reply.code(400).send({ error: err.message });
      throw err;
    }
    const unknown = await findUnknownReference(input.tags, input.ingredients);
    if (unknown) return reply.code(400).send({ error: unknown });

    const image = await saveRecipeImage(mediaRoot, input.image);
    let recipeId: number;
    try {
      recipeId = await withTransaction(req.log, async (client) => {
        const inserted = await client.query<{ id: number }>(
          `INSERT INTO recipes (author_id, name, image, text, cooking_time)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING id`,
          [authUser.id, input.name, image, input.text, input.cookingTime],
        );
        const id = inserted.rows[0].id;
        await replaceTags(client, id, input.tags);
        await replaceIngredients(client, id, input.ingredients);
        return id;
      });
    } catch (err: unknown) {
      await discardImage(req, mediaRoot, image);
      if (isUniqueViolation(err, "recipes_name_text_key")) {
        return reply.code(400).send({ error: DUPLICATE_RECIPE });
      }
      throw err;
    }

    const row = await fetchRecipe(recipeId, authUser.id);
    if (!row) return reply.code(404).send({ error: "Recipe not found" });
    return reply.code(201).send(recipePayload(req, row));
  });

  app.patch<{ Params: { id: string }; Body: RecipeBody | undefined }>("/recipes/:id/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    const existing = await loadOwnedRecipe(req.params.id, reply, authUser);
    if (!existing) return;

    let patch: RecipePatch;
    try {
      patch = parseRecipePatch(req.body ?? {});
    } catch (err) {
      if (err instanceof ValidationError) return reply.code(400).send({ error: err.message });
      throw err;
    }
    const unknown = await findUnknownReference(patch.tags, patch.ingredients);
    if (unknown) return reply.code(400).send({ error: unknown });

    const newImage = patch.image ? await saveRecipeImage(mediaRoot, patch.image) : null;
    try {
      await withTransaction(req.log, async (client) => {
        const params = new SqlParams();
        const assignments: string[] = [];
        if (patch.name !== undefined) assignments.push(`name = ${params.add(patch.name)}`);
        if (patch.text !== undefined) assignments.push(`text = ${params.add(patch.text)}`);
        if (patch.cookingTime !== undefined) assignments.push(`cooking_time = ${params.add(patch.cookingTime)}`);
        if (newImage !== null) assignments.push(`image = ${params.add(newImage)}`);
        if (assignments.length > 0) {
          await client.query(
            `UPDATE recipes SET ${assignments.join(", ")} WHERE id = ${params.add(existing.id)}`,
            params.values,
          );
        }
        if (patch.tags) await replaceTags(client, existing.id, patch.tags);
        if (patch.ingredients) await replaceIngredients(client, existing.id, patch.ingredients);
      });
    } catch (err: unknown) {
      if (newImage !== null) await discardImage(req, mediaRoot, newImage);
      if (isUniqueViolation(err, "recipes_name_text_key")) {
        return reply.code(400).send({ error: DUPLICATE_RECIPE });
      }
      throw err;
    }
    if (newImage !== null) await discardImage(req, mediaRoot, existing.image);

    const row = await fetchRecipe(existing.id, authUser.id);
    if (!row) return reply.code(404).send({ error: "Recipe not found" });
    return recipePayload(req, row);
  });

  app.delete<{ Params: { id: string } }>("/recipes/:id/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    const existing = await loadOwnedRecipe(req.params.id, reply, authUser);
    if (!existing) return;

    await query("DELETE FROM recipes WHERE id = $1", [existing.id]);
    await discardImage(req, mediaRoot, existing.image);
    return reply.code(204).send();
  });

  for (const relation of RELATIONS) {
    app.post<{ Params: { id: string } }>(relation.path, async (req, reply) => {
      const authUser = await requireAuthUser(req, reply);
      if (!authUser) return;

      const id = parseId(req.params.id);
      const recipe = id === null ? null : await fetchCompactRecipe(id);
      if (!recipe) return reply.code(400).send({ error: "Recipe does not exist" });

      try {
        await query(`INSERT INTO ${relation.table} (user_id, recipe_id) VALUES ($1, $2)`, [authUser.id, recipe.id]);
      } catch (err) {
        if (isUniqueViolation(err, relation.constraint)) {
          return reply.code(400).send({ error: relation.alreadyAdded });
        }
        throw err;
      }
      return reply.code(201).send(compactRecipePayload(req, recipe));
    });

    app.delete<{ Params: { id: string } }>(relation.path, async (req, reply) => {
      const authUser = await requireAuthUser(req, reply);
      if (!authUser) return;

      const id = parseId(req.params.id);
      const recipe = id === null ? null : await fetchCompactRecipe(id);
      if (!recipe) return reply.code(400).send({ error: "Recipe does not exist" });

      const result = await query(
        `DELETE FROM ${relation.table} WHERE user_id = $1 AND recipe_id = $2`,
        [authUser.id, recipe.id],
      );
      if (result.rowCount === 0) {
        return reply.code(400).send({ error: relation.notAdded });
      }
      return reply.code(204).send();
    });
  }
}
