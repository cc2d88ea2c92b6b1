import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCookie from "@fastify/cookie";
import fastifyCors from "@fastify/cors";
import { AUTH_COOKIE_NAME } from "./config/index.js";
import { resolveRequestAuth } from "./lib/auth.js";
import { registerDisputeRoutes } from "./routes/disputes.routes.js";
import { registerMarketsInternalRoutes } from "./routes/markets-internal.routes.js";
import { registerResolutionRoutes } from "./routes/resolution.routes.js";
import { registerTreasuryRoutes } from "./routes/treasury.routes.js";
import type { AppDeps } from "./types/app.js";

export interface AppOptions {
  jwtSecret: string;
  apiKey?: string;
  cookieName?: string;
  corsOrigin?: string | string[] | true;
  logger?: FastifyServerOptions["logger"];
}

/**
 * Build the HTTP app. Dependencies are created from the app's own logger so protocol
 * logs land in the same pino stream as request logs.
 */
export async function buildApp(
  options: AppOptions,
  createDeps: (log: FastifyBaseLogger) => AppDeps
): Promise<{ app: FastifyInstance; deps: AppDeps }> {
  const app = Fastify({ logger: options.logger ?? true });
  const deps = createDeps(app.log);
  const authOptions = {
    jwtSecret: options.jwtSecret,
    apiKey: options.apiKey,
    cookieName: options.cookieName ?? AUTH_COOKIE_NAME,
  };

  await app.register(fastifyCookie, { parseOptions: {} });
  await app.register(fastifyCors, {
    origin: options.corsOrigin ?? true,
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "x-api-key", "api-key"],
  });

  app.addHook("preValidation", async (request) => {
    request.auth = await resolveRequestAuth(request, authOptions);
  });

  app.get("/health", async () => ({ status: "ok" }));

  await registerResolutionRoutes(app, deps);
  await registerDisputeRoutes(app, deps);
  await registerTreasuryRoutes(app, deps);
  await registerMarketsInternalRoutes(app, deps);

  return { app, deps };
}
