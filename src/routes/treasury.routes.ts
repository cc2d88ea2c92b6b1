import type { FastifyInstance } from "fastify";
import { requireOperatorOnly } from "../lib/permissions.js";
import { parseRequest, replyWith } from "../lib/protocol-http.js";
import { withdrawFeesBodySchema } from "../schemas/resolution.schema.js";
import type { AppDeps } from "../types/app.js";

export async function registerTreasuryRoutes(app: FastifyInstance, deps: AppDeps): Promise<void> {
  const { protocol } = deps;

  app.get("/api/treasury", async (req, reply) => {
    return replyWith(req, reply, () => ({
      treasury: protocol.getTreasury(),
      metrics: protocol.getMetrics(),
      finalizable: protocol.listFinalizable(),
    }));
  });

  /** POST /api/treasury/withdraw – operator only; the operator address must be an oracle manager. */
  app.post("/api/treasury/withdraw", async (req, reply) => {
    if (!requireOperatorOnly(req, reply)) return;
    const body = parseRequest(withdrawFeesBodySchema, req.body, reply);
    if (!body) return;
    const operator = deps.operatorAddress;
    if (operator === undefined) {
      return reply.code(403).send({ error: "No operator address configured" });
    }
    return replyWith(req, reply, () => {
      protocol.withdrawProtocolFees({ sender: operator }, body.to, body.amount);
      return protocol.getTreasury();
    });
  });
}
