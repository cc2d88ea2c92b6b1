import type { Address } from "viem";
import type { FastifyRequest, FastifyReply } from "fastify";
import { requireOperatorAuth, requireParticipantAuth } from "./auth.js";

/**
 * Require any auth (participant or operator). Returns 401 if unauthenticated.
 */
export function requireAuth(req: FastifyRequest): boolean {
  return req.auth != null;
}

/**
 * Send 401 if no auth, 403 if not operator. Returns true if operator.
 */
export function requireOperatorOnly(req: FastifyRequest, reply: FastifyReply): boolean {
  if (!requireAuth(req)) {
    reply.code(401).send({ error: "Authentication required" });
    return false;
  }
  if (!requireOperatorAuth(req)) {
    reply.code(403).send({ error: "API key required" });
    return false;
  }
  return true;
}

/**
 * Identity a protocol call is made as: the participant's address, or the configured
 * operator address for API-key calls. Sends 401/403 and returns null otherwise.
 */
export function requireCaller(
  req: FastifyRequest,
  reply: FastifyReply,
  operatorAddress: Address | undefined
): Address | null {
  if (!requireAuth(req)) {
    reply.code(401).send({ error: "Authentication required" });
    return null;
  }
  const participant = requireParticipantAuth(req);
  if (participant !== null) return participant.address;
  if (operatorAddress === undefined) {
    reply.code(403).send({ error: "No operator address configured" });
    return null;
  }
  return operatorAddress;
}
