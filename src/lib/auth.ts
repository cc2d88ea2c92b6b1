import { getAddress, isAddress } from "viem";
import type { FastifyRequest } from "fastify";
import { verifyToken } from "./jwt.js";
import type { AuthParticipant, RequestAuth } from "../types/auth.js";

export interface AuthOptions {
  jwtSecret: string;
  apiKey?: string;
  cookieName: string;
}

const AUTH_HEADER = "authorization";

/** Parse Cookie header for a given name (fallback when req.cookies not populated). */
function getCookieFromHeader(cookieHeader: string | undefined, name: string): string | null {
  if (typeof cookieHeader !== "string") return null;
  const regex = new RegExp(`(?:^|;\\s*)${name}=([^;]*)`);
  const match = regex.exec(cookieHeader);
  const raw = match?.[1];
  if (raw === undefined) return null;
  try {
    return decodeURIComponent(raw.trim());
  } catch {
    return raw.trim();
  }
}

export function getJwtFromRequest(req: FastifyRequest, cookieName: string): string | null {
  const cookie = req.cookies?.[cookieName];
  if (cookie && typeof cookie === "string") return cookie;
  const fromHeader = getCookieFromHeader(req.headers["cookie"], cookieName);
  if (fromHeader) return fromHeader;
  const auth = req.headers[AUTH_HEADER];
  if (typeof auth === "string" && auth.toLowerCase().startsWith("bearer ")) {
    return auth.slice(7).trim();
  }
  return null;
}

export function getApiKeyFromRequest(req: FastifyRequest): string | null {
  const header = req.headers["x-api-key"] ?? req.headers["api-key"];
  if (typeof header === "string") return header;
  return null;
}

export function verifyApiKey(key: string, expected: string | undefined): boolean {
  if (!expected) return false;
  return key === expected;
}

export async function resolveRequestAuth(req: FastifyRequest, options: AuthOptions): Promise<RequestAuth> {
  const apiKey = getApiKeyFromRequest(req);
  if (apiKey !== null && verifyApiKey(apiKey, options.apiKey)) {
    return { type: "operator" };
  }

  const jwt = getJwtFromRequest(req, options.cookieName);
  if (jwt !== null) {
    const payload = verifyToken(jwt, options.jwtSecret);
    if (payload !== null && isAddress(payload.sub)) {
      return { type: "participant", address: getAddress(payload.sub) };
    }
  }

  return null;
}

export function requireParticipantAuth(req: FastifyRequest): AuthParticipant | null {
  const auth = req.auth;
  if (auth?.type === "participant") return auth;
  return null;
}

export function requireOperatorAuth(req: FastifyRequest): boolean {
  return req.auth?.type === "operator";
}
