import type { FastifyInstance } from "fastify";
import { query } from "../db.js";
import { buildPage, isPageOutOfRange, parsePageParams, type PageQuery } from "../pagination.js";
import { isUniqueViolation } from "../pg-errors.js";
import { firstValue, type QueryValue } from "../query-values.js";
import { requireAuthUser } from "../request-auth.js";
import { tagPayload, ingredientPayload, type IngredientRow, type TagRow } from "../serializers.js";
import { SqlParams, escapeLike, whereClause } from "../sql.js";
import { ValidationError, requiredText } from "../validation.js";

const ADMIN_PAGE_SIZE = 50;
const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;
const SLUG = /^[-a-zA-Z0-9_]+$/;

interface AdminListing {
  path: string;
  from: string;
  columns: string;
  search: string[];
  orderBy: string;
}

const LISTINGS: AdminListing[] = [
  {
    path: "/users/",
    from: "users u",
    columns: "u.id, u.email, u.username, u.first_name, u.last_name, u.is_staff, u.is_active",
    search: ["u.email", "u.username"],
    orderBy: "u.id",
  },
  {
    path: "/tags/",
    from: "tags t",
    columns: "t.id, t.name, t.color, t.slug",
    search: ["t.name", "t.slug"],
    orderBy: "t.id",
  },
  {
    path: "/ingredients/",
    from: "ingredients i",
    columns: "i.id, i.name, i.measurement_unit",
    search: ["i.name"],
    orderBy: "i.name, i.id",
  },
  {
    path: "/recipes/",
    from: "recipes r JOIN users a ON a.id = r.author_id",
    columns: `r.id, r.name, a.username AS author, r.cooking_time,
      (SELECT COUNT(*)::int FROM favorites fv WHERE fv.recipe_id = r.id) AS favorites_count`,
    search: ["r.name", "a.username"],
    orderBy: "r.id DESC",
  },
  {
    path: "/favorites/",
    from: "favorites x JOIN users u ON u.id = x.user_id JOIN recipes r ON r.id = x.recipe_id",
    columns: "x.id, u.username AS user, r.name AS recipe",
    search: ["u.username", "r.name"],
    orderBy: "x.id",
  },
  {
    path: "/shopping_carts/",
    from: "shopping_carts x JOIN users u ON u.id = x.user_id JOIN recipes r ON r.id = x.recipe_id",
    columns: "x.id, u.username AS user, r.name AS recipe",
    search: ["u.username", "r.name"],
    orderBy: "x.id",
  },
];

function searchConditions(params: SqlParams, listing: AdminListing, search: QueryValue | undefined): string[] {
  const term = firstValue(search)?.trim();
  if (!term) return [];
  const pattern = params.add(`%${escapeLike(term)}%`);
  return [`(${listing.search.map((column) => `${column} ILIKE ${pattern}`).join(" OR ")})`];
}

function parseTag(body: { name?: unknown; color?: unknown; slug?: unknown }) {
  const name = requiredText(body.name, "name", 200);
  const color = requiredText(body.color, "color", 7);
  if (!HEX_COLOR.test(color)) throw new ValidationError("color must be a hex color such as #49B64E");
  const slug = requiredText(body.slug, "slug", 200);
  if (!SLUG.test(slug)) throw new ValidationError("slug may contain only letters, digits, - and _");
  return { name, color: color.toUpperCase(), slug };
}

/** Staff-only JSON views over every table, plus tag and ingredient creation. */
export async function adminRoutes(app: FastifyInstance) {
  app.addHook("preHandler", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return reply;
    if (!authUser.isStaff) {
      return reply.code(403).send({ error: "Staff access required" });
    }
  });

  for (const listing of LISTINGS) {
    app.get<{ Querystring: PageQuery & { search?: QueryValue } }>(listing.path, async (req, reply) => {
      const page = parsePageParams(req.query, ADMIN_PAGE_SIZE);

      const countParams = new SqlParams();
      const countWhere = whereClause(searchConditions(countParams, listing, req.query.search));
      const countResult = await query<{ count: number }>(
        `SELECT COUNT(*)::int AS count FROM ${listing.from} ${countWhere}`,
        countParams.values,
      );
      const count = countResult.rows[0]?.count ?? 0;
      if (isPageOutOfRange(page, count)) {
        return reply.code(404).send({ error: "Invalid page" });
      }

      const params = new SqlParams();
      const where = whereClause(searchConditions(params, listing, req.query.search));
      const result = await query(
        `SELECT ${listing.columns}
         FROM ${listing.from}
         ${where}
         ORDER BY ${listing.orderBy}
         LIMIT ${params.add(page.limit)} OFFSET ${params.add(page.offset)}`,
        params.values,
      );
      return buildPage(req, page, count, result.rows);
    });
  }

  app.post<{ Body: { name?: unknown; color?: unknown; slug?: unknown } | undefined }>("/tags/", async (req, reply) => {
    let input: ReturnType<typeof parseTag>;
    try {
      input = parseTag(req.body ?? {});
    } catch (err) {
      if (err instanceof ValidationError) return reply.code(400).send({ error: err.message });
      throw err;
    }

    try {
      const result = await query<TagRow>(
        "INSERT INTO tags (name, color, slug) VALUES ($1, $2, $3) RETURNING id, name, color, slug",
        [input.name, input.color, input.slug],
      );
      return reply.code(201).send(tagPayload(result.rows[0]));
    } catch (err) {
      if (isUniqueViolation(err, "tags_name_key")) {
        return reply.code(400).send({ error: "A tag with this name already exists" });
      }
      if (isUniqueViolation(err, "tags_slug_key")) {
        return reply.code(400).send({ error: "A tag with this slug already exists" });
      }
      if (isUniqueViolation(err, "tags_color_key")) {
        return reply.code(400).send({ error: "A tag with this color already exists" });
      }
      throw err;
    }
  });

  app.post<{ Body: { name?: unknown; measurement_unit?: unknown } | undefined }>(
    "/ingredients/",
    async (req, reply) => {
      let name: string;
      let unit: string;
      try {
        name = requiredText(req.body?.name, "name", 200);
        unit = requiredText(req.body?.measurement_unit, "measurement_unit", 24);
      } catch (err) {
        if (err instanceof ValidationError) return reply.code(400).send({ error: err.message });
        throw err;
      }

      try {
        const result = await query<IngredientRow>(
          "INSERT INTO ingredients (name, measurement_unit) VALUES ($1, $2) RETURNING id, name, measurement_unit",
          [name, unit],
        );
        return reply.code(201).send(ingredientPayload(result.rows[0]));
      } catch (err) {
        if (isUniqueViolation(err, "ingredients_name_unit_key")) {
          return reply.code(400).send({ error: "This ingredient already exists" });
        }
        throw err;
      }
    },
  );
}
