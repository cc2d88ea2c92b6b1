/**
 * Operator management of the in-process market mirror and participant balances.
 * Require API key.
 */

import type { FastifyInstance } from "fastify";
import { requireAddress } from "../engine/resolution/commitments.js";
import { requireOperatorOnly } from "../lib/permissions.js";
import { parseRequest, replyWith } from "../lib/protocol-http.js";
import {
  creditBodySchema,
  creditParamsSchema,
  marketParamsSchema,
  marketStateBodySchema,
  registerMarketBodySchema,
} from "../schemas/resolution.schema.js";
import type { AppDeps } from "../types/app.js";

export async function registerMarketsInternalRoutes(app: FastifyInstance, deps: AppDeps): Promise<void> {
  const { markets, funds } = deps;

  app.get("/api/internal/markets", async (req, reply) => {
    if (!requireOperatorOnly(req, reply)) return;
    return replyWith(req, reply, () => markets.list());
  });

  app.post("/api/internal/markets", async (req, reply) => {
    if (!requireOperatorOnly(req, reply)) return;
    const body = parseRequest(registerMarketBodySchema, req.body, reply);
    if (!body) return;
    return replyWith(req, reply, () => markets.register(body), 201);
  });

  app.post("/api/internal/markets/:marketId/state", async (req, reply) => {
    if (!requireOperatorOnly(req, reply)) return;
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(marketStateBodySchema, req.body, reply);
    if (!params || !body) return;
    return replyWith(req, reply, () => {
      markets.advanceResolutionState(params.marketId, body.state);
      return markets.get(params.marketId);
    });
  });

  app.get("/api/internal/accounts/:address", async (req, reply) => {
    if (!requireOperatorOnly(req, reply)) return;
    const params = parseRequest(creditParamsSchema, req.params, reply);
    if (!params) return;
    return replyWith(req, reply, () => {
      const address = requireAddress(params.address);
      return { address, balance: funds.balanceOf(address) };
    });
  });

  app.post("/api/internal/accounts/:address/credit", async (req, reply) => {
    if (!requireOperatorOnly(req, reply)) return;
    const params = parseRequest(creditParamsSchema, req.params, reply);
    const body = params && parseRequest(creditBodySchema, req.body, reply);
    if (!params || !body) return;
    return replyWith(req, reply, () => {
      const address = requireAddress(params.address);
      return { address, balance: funds.credit(address, body.amount) };
    });
  });
}
