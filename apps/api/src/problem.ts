import type { FastifyReply } from "fastify";

export function withProblem(
  reply: FastifyReply,
  status: number,
  title: string,
  detail: string,
  instance?: string,
) {
  return reply.code(status).type("application/problem+json").send({
    type: "https://tools.ietf.org/html/rfc7807#section-3.1",
    title,
    status,
    detail,
    instance,
  });
}

export function unauthorized(reply: FastifyReply, instance?: string) {
  return withProblem(reply, 401, "Unauthorized", "Authentication credentials were not provided", instance);
}
