import type { FastifyInstance } from "fastify";
import { query } from "../db.js";
import { buildPage, isPageOutOfRange, parsePageParams, type PageQuery } from "../pagination.js";
import { hashPassword, passwordProblem, verifyPassword } from "../passwords.js";
import { isUniqueViolation } from "../pg-errors.js";
import { fetchRecipesByAuthors, userColumns } from "../queries.js";
import { firstValue, type QueryValue } from "../query-values.js";
import { getOptionalViewer, parseId, requireAuthUser } from "../request-auth.js";
import { subscriptionPayload, userPayload, type SubscriptionRow, type UserRow } from "../serializers.js";
import { ValidationError, requiredText } from "../validation.js";

interface RegisterBody {
  email?: unknown;
  username?: unknown;
  first_name?: unknown;
  last_name?: unknown;
  password?: unknown;
}

interface CreatedUserRow {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
}

const USERNAME_PATTERN = /^[\p{L}\p{N}_.@+-]+$/u;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const NAME_MAX_LENGTH = 150;
const EMAIL_MAX_LENGTH = 254;

function parseRegistration(body: RegisterBody) {
  const email = requiredText(body.email, "email", EMAIL_MAX_LENGTH);
  if (!EMAIL_PATTERN.test(email)) throw new ValidationError("email must be a valid email address");

  const username = requiredText(body.username, "username", NAME_MAX_LENGTH);
  if (!USERNAME_PATTERN.test(username)) {
    throw new ValidationError("username may contain only letters, digits and _ . @ + -");
  }

  const firstName = requiredText(body.first_name, "first_name", NAME_MAX_LENGTH);
  const lastName = requiredText(body.last_name, "last_name", NAME_MAX_LENGTH);

  const problem = passwordProblem(body.password);
  if (problem || typeof body.password !== "string") {
    throw new ValidationError(problem ?? "password is required");
  }

  return { email, username, firstName, lastName, password: body.password };
}

function parseRecipesLimit(raw: QueryValue | undefined): number | null {
  const text = firstValue(raw);
  if (text === undefined || !/^\d+$/.test(text)) return null;
  const value = Number(text);
  return value > 0 ? value : null;
}

export async function userRoutes(app: FastifyInstance) {
  app.get<{ Querystring: PageQuery }>("/users/", async (req, reply) => {
    const viewer = await getOptionalViewer(req, reply);
    if (viewer === undefined) return;

    const params = parsePageParams(req.query);
    const countResult = await query<{ count: number }>("SELECT COUNT(*)::int AS count FROM users");
    const count = countResult.rows[0]?.count ?? 0;
    if (isPageOutOfRange(params, count)) {
      return reply.code(404).send({ error: "Invalid page" });
    }

    const result = await query<UserRow>(
      `SELECT ${userColumns("u", "$1")}
       FROM users u
       ORDER BY u.username
       LIMIT $2 OFFSET $3`,
      [viewer?.id ?? null, params.limit, params.offset],
    );

    return buildPage(req, params, count, result.rows.map(userPayload));
  });

  app.post<{ Body: RegisterBody | undefined }>("/users/", async (req, reply) => {
    let input: ReturnType<typeof parseRegistration>;
    try {
      input = parseRegistration(req.body ?? {});
    } catch (err) {
      if (err instanceof ValidationError) return reply.code(400).send({ error: err.message });
      throw err;
    }

    try {
      const result = await query<CreatedUserRow>(
        `INSERT INTO users (email, username, first_name, last_name, password)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, email, username, first_name, last_name`,
        [input.email, input.username, input.firstName, input.lastName, await hashPassword(input.password)],
      );
      const row = result.rows[0];
      return reply.code(201).send({
        email: row.email,
        id: row.id,
        username: row.username,
        first_name: row.first_name,
        last_name: row.last_name,
      });
    } catch (err) {
      if (isUniqueViolation(err, "users_email_key")) {
        return reply.code(400).send({ error: "A user with that email already exists" });
      }
      if (isUniqueViolation(err, "users_username_key")) {
        return reply.code(400).send({ error: "A user with that username already exists" });
      }
      throw err;
    }
  });

  app.get("/users/me/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    return {
      email: authUser.email,
      id: authUser.id,
      username: authUser.username,
      first_name: authUser.firstName,
      last_name: authUser.lastName,
      is_subscribed: false,
    };
  });

  app.post<{ Body: { new_password?: unknown; current_password?: unknown } | undefined }>(
    "/users/set_password/",
    async (req, reply) => {
      const authUser = await requireAuthUser(req, reply);
      if (!authUser) return;

      const currentPassword = req.body?.current_password;
      const newPassword = req.body?.new_password;
      if (typeof currentPassword !== "string" || !currentPassword) {
        return reply.code(400).send({ error: "current_password is required" });
      }
      const problem = passwordProblem(newPassword);
      if (problem || typeof newPassword !== "string") {
        return reply.code(400).send({ error: problem ?? "password is required" });
      }

      const result = await query<{ password: string }>("SELECT password FROM users WHERE id = $1", [authUser.id]);
      const stored = result.rows[0];
      if (!stored || !(await verifyPassword(currentPassword, stored.password))) {
        return reply.code(400).send({ error: "current_password is incorrect" });
      }

      await query("UPDATE users SET password = $1 WHERE id = $2", [await hashPassword(newPassword), authUser.id]);
      return reply.code(204).send();
    },
  );

  app.get<{ Querystring: PageQuery & { recipes_limit?: QueryValue } }>(
    "/users/subscriptions/",
    async (req, reply) => {
      const authUser = await requireAuthUser(req, reply);
      if (!authUser) return;

      const params = parsePageParams(req.query);
      const countResult = await query<{ count: number }>(
        "SELECT COUNT(*)::int AS count FROM follows WHERE user_id = $1",
        [authUser.id],
      );
      const count = countResult.rows[0]?.count ?? 0;
      if (isPageOutOfRange(params, count)) {
        return reply.code(404).send({ error: "Invalid page" });
      }

      const result = await query<SubscriptionRow>(
        `SELECT u.id, u.email, u.username, u.first_name, u.last_name,
                (SELECT COUNT(*)::int FROM recipes r WHERE r.author_id = u.id) AS recipes_count
         FROM follows f
         JOIN users u ON u.id = f.following_id
         WHERE f.user_id = $1
         ORDER BY u.username
         LIMIT $2 OFFSET $3`,
        [authUser.id, params.limit, params.offset],
      );

      const recipes = await fetchRecipesByAuthors(
        result.rows.map((row) => row.id),
        parseRecipesLimit(req.query.recipes_limit),
      );

      return buildPage(
        req,
        params,
        count,
        result.rows.map((row) => subscriptionPayload(req, row, recipes.get(row.id) ?? [])),
      );
    },
  );

  app.get<{ Params: { id: string } }>("/users/:id/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    const id = parseId(req.params.id);
    if (id === null) return reply.code(404).send({ error: "User not found" });

    const result = await query<UserRow>(
      `SELECT ${userColumns("u", "$1")} FROM users u WHERE u.id = $2`,
      [authUser.id, id],
    );
    if (result.rows.length === 0) {
      return reply.code(404).send({ error: "User not found" });
    }
    return userPayload(result.rows[0]);
  });

  app.post<{ Params: { id: string }; Querystring: { recipes_limit?: QueryValue } }>(
    "/users/:id/subscribe/",
    async (req, reply) => {
      const authUser = await requireAuthUser(req, reply);
      if (!authUser) return;

      const id = parseId(req.params.id);
      const target = id === null
        ? null
        : (await query<SubscriptionRow>(
            `SELECT u.id, u.email, u.username, u.first_name, u.last_name,
                    (SELECT COUNT(*)::int FROM recipes r WHERE r.author_id = u.id) AS recipes_count
             FROM users u
             WHERE u.id = $1`,
            [id],
          )).rows[0];
      if (!target) return reply.code(404).send({ error: "User not found" });

      if (target.id === authUser.id) {
        return reply.code(400).send({ error: "You cannot subscribe to yourself" });
      }

      try {
        await query("INSERT INTO follows (user_id, following_id) VALUES ($1, $2)", [authUser.id, target.id]);
      } catch (err) {
        if (isUniqueViolation(err, "unique_follow")) {
          return reply.code(400).send({ error: "You are already subscribed to this user" });
        }
        throw err;
      }

      const recipes = await fetchRecipesByAuthors([target.id], parseRecipesLimit(req.query.recipes_limit));
      return reply.code(201).send(subscriptionPayload(req, target, recipes.get(target.id) ?? []));
    },
  );

  app.delete<{ Params: { id: string } }>("/users/:id/subscribe/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    const id = parseId(req.params.id);
    const exists = id === null
      ? false
      : ((await query("SELECT 1 FROM users WHERE id = $1", [id])).rowCount ?? 0) > 0;
    if (!exists) return reply.code(404).send({ error: "User not found" });

    const result = await query(
      "DELETE FROM follows WHERE user_id = $1 AND following_id = $2",
      [authUser.id, id],
    );
    if (result.rowCount === 0) {
      return reply.code(400).send({ error: "You are not subscribed to this user" });
    }
    return reply.code(204).send();
  });
}
