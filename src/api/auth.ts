import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: { sub: string; admin?: boolean };
    user: { sub: string; admin?: boolean };
  }
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  admin: z.boolean().optional()
});

export interface Actor {
  actorId: string;
  /** Administrative capability: may drive other actors' sessions and edit schedules. */
  isAdmin: boolean;
}

export async function requireAuth(request: FastifyRequest, reply: FastifyReply) {
  try {
    await request.jwtVerify();
  } catch {
    return reply.unauthorized("Authentication required.");
  }
}

export function getActor(request: FastifyRequest): Actor {
  const claims = claimsSchema.safeParse(request.user);
  if (!claims.success) {
    throw request.server.httpErrors.unauthorized("Missing authenticated user.");
  }

  return {
    actorId: claims.data.sub,
    isAdmin: claims.data.admin === true
  };
}

export async function requireAdmin(request: FastifyRequest, reply: FastifyReply) {
  if (!getActor(request).isAdmin) {
    return reply.forbidden("Administrator access required.");
  }
}
