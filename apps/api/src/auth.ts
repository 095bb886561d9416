import type { FastifyReply, FastifyRequest } from "fastify";
import { query } from "./db.js";
import { unauthorized, withProblem } from "./problem.js";

interface TokenUserRow {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  is_staff: boolean;
}

export interface AuthUser {
  id: number;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  isStaff: boolean;
  token: string;
}

declare module "fastify" {
  interface FastifyRequest {
    auth?: AuthUser;
  }
}

const TOKEN_PREFIX = "Token ";

function mapRow(row: TokenUserRow, token: string): AuthUser {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    isStaff: row.is_staff,
    token,
  };
}

async function findUserByToken(token: string): Promise<AuthUser | null> {
  const result = await query<TokenUserRow>(
    `SELECT u.id, u.email, u.username, u.first_name, u.last_name, u.is_staff
     FROM auth_tokens t
     JOIN users u ON u.id = t.user_id
     WHERE t.key = $1 AND u.is_active = true`,
    [token],
  );
  return result.rows.length > 0 ? mapRow(result.rows[0], token) : null;
}

async function authenticateRequest(
  req: FastifyRequest,
  reply: FastifyReply,
  options: { required: boolean },
): Promise<AuthUser | null> {
  if (req.auth) return req.auth;

  const header = req.headers.authorization;
  if (!header) {
    if (options.required) {
      unauthorized(reply, req.url);
    }
    return null;
  }

  const token = header.startsWith(TOKEN_PREFIX) ? header.slice(TOKEN_PREFIX.length).trim() : "";
  if (!token) {
    withProblem(reply, 401, "Unauthorized", "Missing or invalid Authorization header", req.url);
    return null;
  }

  let user: AuthUser | null;
  try {
    user = await findUserByToken(token);
  } catch (err) {
    req.log.error({ err }, "Token lookup failed");
    withProblem(reply, 500, "Internal Server Error", "Token lookup failed", req.url);
    return null;
  }

  if (!user) {
    withProblem(reply, 401, "Unauthorized", "Invalid token", req.url);
    return null;
  }

  req.auth = user;
  return user;
}

export async function verifyAuth(req: FastifyRequest, reply: FastifyReply) {
  await authenticateRequest(req, reply, { required: true });
}

export async function verifyOptionalAuth(req: FastifyRequest, reply: FastifyReply) {
  await authenticateRequest(req, reply, { required: false });
}
