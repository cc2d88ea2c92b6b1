import type { FastifyInstance } from "fastify";
import { requireCaller } from "../lib/permissions.js";
import { parseRequest, replyWith } from "../lib/protocol-http.js";
import {
  disputeBodySchema,
  indexParamsSchema,
  marketParamsSchema,
  roundBodySchema,
  roundQuerySchema,
  stakeBodySchema,
} from "../schemas/resolution.schema.js";
import type { AppDeps } from "../types/app.js";

const BASE = "/api/markets/:marketId/disputes";

export async function registerDisputeRoutes(app: FastifyInstance, deps: AppDeps): Promise<void> {
  const { protocol } = deps;

  app.get(BASE, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const query = params && parseRequest(roundQuerySchema, req.query, reply);
    if (!params || !query) return;
    return replyWith(req, reply, () => protocol.getDisputes(params.marketId, query.round));
  });

  app.post(BASE, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(disputeBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    const { value, ...input } = body;
    return replyWith(req, reply, () => protocol.disputeResolution({ sender, value }, params.marketId, input), 201);
  });

  app.post(`${BASE}/:index/support`, async (req, reply) => {
    const params = parseRequest(indexParamsSchema, req.params, reply);
    const body = params && parseRequest(stakeBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () =>
      protocol.supportDispute({ sender, value: body.value }, params.marketId, params.index)
    );
  });

  app.post(`${BASE}/:index/endorse`, async (req, reply) => {
    const params = parseRequest(indexParamsSchema, req.params, reply);
    if (!params) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => protocol.endorseDispute({ sender }, params.marketId, params.index));
  });

  app.post(`${BASE}/:index/claim`, async (req, reply) => {
    const params = parseRequest(indexParamsSchema, req.params, reply);
    const body = params && parseRequest(roundBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => ({
      amount: protocol.claimDisputeReward({ sender }, params.marketId, params.index, body.round),
    }));
  });

  app.post(`${BASE}/:index/reclaim`, async (req, reply) => {
    const params = parseRequest(indexParamsSchema, req.params, reply);
    const body = params && parseRequest(roundBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => ({
      amount: protocol.reclaimDisputeStake({ sender }, params.marketId, params.index, body.round),
    }));
  });
}
