import type { FastifyInstance } from "fastify";
import { query } from "../db.js";
import { firstValue, type QueryValue } from "../query-values.js";
import { parseId } from "../request-auth.js";
import { ingredientPayload, type IngredientRow } from "../serializers.js";
import { escapeLike } from "../sql.js";

export async function ingredientRoutes(app: FastifyInstance) {
  app.get<{ Querystring: { name?: QueryValue } }>("/ingredients/", async (req) => {
    const name = firstValue(req.query.name)?.trim();
    const result = name
      ? await query<IngredientRow>(
          `SELECT id, name, measurement_unit FROM ingredients
           WHERE lower(name) LIKE lower($1) || '%'
           ORDER BY name, id`,
          [escapeLike(name)],
        )
      : await query<IngredientRow>("SELECT id, name, measurement_unit FROM ingredients ORDER BY name, id");

    return result.rows.map(ingredientPayload);
  });

  app.get<{ Params: { id: string } }>("/ingredients/:id/", async (req, reply) => {
    const id = parseId(req.params.id);
    const result = id === null
      ? null
      : await query<IngredientRow>("SELECT id, name, measurement_unit FROM ingredients WHERE id = $1", [id]);
    const row = result?.rows[0];
    if (!row) return reply.code(404).send({ error: "Ingredient not found" });
    return ingredientPayload(row);
  });
}
