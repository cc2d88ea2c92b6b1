import jwt from "jsonwebtoken";

export interface JwtPayload {
  sub: string;
  iat?: number;
  exp?: number;
}

export function verifyToken(token: string, secret: string): JwtPayload | null {
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === "string" || typeof decoded.sub !== "string") return null;
    return { sub: decoded.sub, iat: decoded.iat, exp: decoded.exp };
  } catch {
    return null;
  }
}

export function signToken(sub: string, secret: string, expiresInSeconds = 3600): string {
  return jwt.sign({ sub }, secret, { expiresIn: expiresInSeconds });
}
