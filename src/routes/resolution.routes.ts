/**
 * Resolution lifecycle: commit-reveal proposal, staking, evidence challenges,
 * legislator voting, finalization and support/opposition claims.
 * Mutations act as the authenticated participant (JWT) or the operator address (API key).
 */

import type { FastifyInstance } from "fastify";
import { requireCaller } from "../lib/permissions.js";
import { parseRequest, replyWith, sendProtocolError, toJson } from "../lib/protocol-http.js";
import {
  commitBodySchema,
  committerParamsSchema,
  evidenceChallengeBodySchema,
  indexParamsSchema,
  legislatorParamsSchema,
  marketParamsSchema,
  proposeBodySchema,
  resolveChallengeBodySchema,
  roundBodySchema,
  roundQuerySchema,
  stakeBodySchema,
  voteCommitBodySchema,
  voteRevealBodySchema,
} from "../schemas/resolution.schema.js";
import type { AppDeps } from "../types/app.js";

const BASE = "/api/markets/:marketId/resolution";

export async function registerResolutionRoutes(app: FastifyInstance, deps: AppDeps): Promise<void> {
  const { protocol } = deps;

  app.get(BASE, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const query = params && parseRequest(roundQuerySchema, req.query, reply);
    if (!params || !query) return;
    try {
      const resolution = protocol.getResolution(params.marketId, query.round);
      const price = deps.priceOracle?.getRecordedPrice(params.marketId) ?? null;
      return reply.send({
        data: toJson({
          resolution,
          rounds: protocol.getRoundCount(params.marketId),
          roster: protocol.getRosterSnapshot(params.marketId, resolution.round),
          earmarked: protocol.getEarmarked(params.marketId),
          price: price?.recorded ? price : null,
        }),
      });
    } catch (err) {
      return sendProtocolError(req, reply, err);
    }
  });

  app.get(`${BASE}/dispute-bond`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    if (!params) return;
    return replyWith(req, reply, () => ({ requiredBond: protocol.getRequiredDisputeBond(params.marketId) }));
  });

  app.get(`${BASE}/dispute-preview`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const query = params && parseRequest(roundQuerySchema, req.query, reply);
    if (!params || !query) return;
    return replyWith(req, reply, () => protocol.previewDisputeOutcome(params.marketId, query.round));
  });

  app.post(`${BASE}/commit`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(commitBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(
      req,
      reply,
      () => protocol.commitResolution({ sender, value: body.value }, params.marketId, body.commitHash),
      201
    );
  });

  app.post(`${BASE}/propose`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(proposeBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    const { value, ...input } = body;
    return replyWith(req, reply, () => protocol.proposeResolution({ sender, value }, params.marketId, input), 201);
  });

  app.post(`${BASE}/support`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(stakeBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => protocol.supportResolution({ sender, value: body.value }, params.marketId));
  });

  app.post(`${BASE}/oppose`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(stakeBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => protocol.opposeResolution({ sender, value: body.value }, params.marketId));
  });

  app.post(`${BASE}/finalize`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(roundBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => protocol.finalizeResolution({ sender }, params.marketId, body.round));
  });

  app.post(`${BASE}/commits/:committer/slash`, async (req, reply) => {
    const params = parseRequest(committerParamsSchema, req.params, reply);
    if (!params) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => ({
      bounty: protocol.slashUnrevealedCommit({ sender }, params.marketId, params.committer),
    }));
  });

  app.get(`${BASE}/evidence-challenges`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const query = params && parseRequest(roundQuerySchema, req.query, reply);
    if (!params || !query) return;
    return replyWith(req, reply, () => protocol.getEvidenceChallenges(params.marketId, query.round));
  });

  app.post(`${BASE}/evidence-challenges`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(evidenceChallengeBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(
      req,
      reply,
      () => protocol.challengeEvidence({ sender, value: body.value }, params.marketId, body.reason),
      201
    );
  });

  app.post(`${BASE}/evidence-challenges/:index/resolve`, async (req, reply) => {
    const params = parseRequest(indexParamsSchema, req.params, reply);
    const body = params && parseRequest(resolveChallengeBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => ({
      payout: protocol.resolveEvidenceChallenge({ sender }, params.marketId, params.index, body.upheld, body.round),
    }));
  });

  app.post(`${BASE}/votes/commit`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(voteCommitBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(
      req,
      reply,
      () => protocol.commitLegislatorVote({ sender }, params.marketId, body.commitHash),
      201
    );
  });

  app.post(`${BASE}/votes/reveal`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(voteRevealBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () =>
      protocol.revealLegislatorVote({ sender }, params.marketId, body.support, body.salt)
    );
  });

  app.post(`${BASE}/votes/:legislator/slash`, async (req, reply) => {
    const params = parseRequest(legislatorParamsSchema, req.params, reply);
    if (!params) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => ({
      penalty: protocol.slashNonRevealingLegislator({ sender }, params.marketId, params.legislator),
    }));
  });

  app.post(`${BASE}/claims/support`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(roundBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => ({
      amount: protocol.claimResolutionReward({ sender }, params.marketId, body.round),
    }));
  });

  app.post(`${BASE}/claims/opposition`, async (req, reply) => {
    const params = parseRequest(marketParamsSchema, req.params, reply);
    const body = params && parseRequest(roundBodySchema, req.body, reply);
    if (!params || !body) return;
    const sender = requireCaller(req, reply, deps.operatorAddress);
    if (!sender) return;
    return replyWith(req, reply, () => ({
      amount: protocol.claimOppositionReward({ sender }, params.marketId, body.round),
    }));
  });
}
