import { randomBytes } from "node:crypto";
import type { FastifyInstance } from "fastify";
import { query } from "../db.js";
import { verifyPassword } from "../passwords.js";
import { requireAuthUser } from "../request-auth.js";

interface LoginRow {
  id: number;
  password: string;
  is_active: boolean;
}

const INVALID_CREDENTIALS = "Unable to log in with provided credentials.";

function generateTokenKey(): string {
  return randomBytes(20).toString("hex");
}

export async function tokenRoutes(app: FastifyInstance) {
  app.post<{ Body: { email?: unknown; password?: unknown } | undefined }>(
    "/auth/token/login/",
    async (req, reply) => {
      const email = req.body?.email;
      const password = req.body?.password;
      if (typeof email !== "string" || !email.trim() || typeof password !== "string" || !password) {
        return reply.code(400).send({ error: "email and password are required" });
      }

      const result = await query<LoginRow>(
        "SELECT id, password, is_active FROM users WHERE email = $1",
        [email.trim()],
      );
      const user = result.rows[0];
      if (!user || !user.is_active || !(await verifyPassword(password, user.password))) {
        return reply.code(400).send({ error: INVALID_CREDENTIALS });
      }

      const token = await query<{ key: string }>(
        `INSERT INTO auth_tokens (key, user_id)
         VALUES ($1, $2)
         ON CONFLICT (user_id) DO UPDATE SET user_id = EXCLUDED.user_id
         RETURNING key`,
        [generateTokenKey(), user.id],
      );

      return { auth_token: token.rows[0].key };
    },
  );

  app.post("/auth/token/logout/", async (req, reply) => {
    const authUser = await requireAuthUser(req, reply);
    if (!authUser) return;

    await query("DELETE FROM auth_tokens WHERE key = $1", [authUser.token]);
    return reply.code(204).send();
  });
}
