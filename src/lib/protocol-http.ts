/**
 * HTTP plumbing shared by the resolution routes: request parsing, bigint-safe responses
 * and the mapping from protocol errors to status codes.
 */

import type { FastifyReply, FastifyRequest } from "fastify";
import type { z } from "zod";
import { ProtocolError, type ProtocolErrorCode } from "../engine/resolution/errors.js";

const STATUS_BY_CODE: Record<ProtocolErrorCode, number> = {
  VALIDATION: 400,
  WINDOW_CLOSED: 400,
  NOT_FOUND: 404,
  UNAUTHORIZED: 403,
  INSOLVENT: 409,
  REENTRANT: 409,
};

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Convert bigints to decimal strings, Maps to objects and Sets to arrays. */
export function toJson(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (Array.isArray(value)) return value.map(toJson);
  if (value instanceof Set) return [...value].map(toJson);
  if (value instanceof Map) {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of value) out[String(k)] = toJson(v);
    return out;
  }
  if (typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) out[k] = toJson(v);
    }
    return out;
  }
  return null;
}

export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  reply: FastifyReply
): z.output<S> | null {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    return null;
  }
  return parsed.data;
}

export function sendProtocolError(req: FastifyRequest, reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ProtocolError) {
    const status = STATUS_BY_CODE[err.code];
    req.log.warn({ code: err.code, msg: err.message }, "Protocol call rejected");
    return reply.code(status).send({ error: err.message, code: err.code });
  }
  req.log.error({ err }, "Protocol call failed");
  return reply.code(500).send({ error: "Internal error" });
}

/** Run a synchronous protocol call and reply with its result, or the mapped error. */
export function replyWith(
  req: FastifyRequest,
  reply: FastifyReply,
  fn: () => unknown,
  status = 200
): FastifyReply {
  try {
    return reply.code(status).send({ data: toJson(fn()) });
  } catch (err) {
    return sendProtocolError(req, reply, err);
  }
}
