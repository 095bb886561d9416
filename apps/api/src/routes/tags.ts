import type { FastifyInstance } from "fastify";
import { query } from "../db.js";
import { parseId } from "../request-auth.js";
import { tagPayload, type TagRow } from "../serializers.js";

export async function tagRoutes(app: FastifyInstance) {
  app.get("/tags/", async () => {
    const result = await query<TagRow>("SELECT id, name, color, slug FROM tags ORDER BY id");
    return result.rows.map(tagPayload);
  });

  app.get<{ Params: { id: string } }>("/tags/:id/", async (req, reply) => {
    const id = parseId(req.params.id);
    const result = id === null
      ? null
      : await query<TagRow>("SELECT id, name, color, slug FROM tags WHERE id = $1", [id]);
    const row = result?.rows[0];
    if (!row) return reply.code(404).send({ error: "Tag not found" });
    return tagPayload(row);
  });
}
