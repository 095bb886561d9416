import type { FastifyReply, FastifyRequest } from "fastify";
import { verifyAuth, verifyOptionalAuth, type AuthUser } from "./auth.js";

export async function requireAuthUser(req: FastifyRequest, reply: FastifyReply): Promise<AuthUser | null> {
  await verifyAuth(req, reply);
  if (reply.sent) return null;
  return req.auth ?? null;
}

/** `undefined` means a reply was already sent; `null` is an anonymous viewer. */
export async function getOptionalViewer(
  req: FastifyRequest,
  reply: FastifyReply,
): Promise<AuthUser | null | undefined> {
  await verifyOptionalAuth(req, reply);
  if (reply.sent) return undefined;
  return req.auth ?? null;
}

export function parseId(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const value = Number(raw);
  return Number.isSafeInteger(value) && value > 0 && value <= 2_147_483_647 ? value : null;
}
