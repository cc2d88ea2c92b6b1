import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../src/app.js";
import { AUTH_COOKIE_NAME } from "../../src/config/index.js";
import { resolutionCommitment } from "../../src/engine/index.js";
import { signToken } from "../../src/lib/jwt.js";
import {
  CHALLENGER,
  EVIDENCE_HASH,
  EVIDENCE_URI,
  MANAGER,
  MARKET,
  PROPOSER,
  SALT,
  T0,
  createHarness,
  type Harness,
} from "../helpers/harness.js";

const JWT_SECRET = "test-secret";
const API_KEY = "test-api-key";
const BASE = `/api/markets/${MARKET}/resolution`;

function bearer(address: string): Record<string, string> {
  return { authorization: `Bearer ${signToken(address, JWT_SECRET)}` };
}

describe("resolution routes", () => {
  let h: Harness;
  let app: FastifyInstance;

  beforeEach(async () => {
    h = createHarness();
    const built = await buildApp({ jwtSecret: JWT_SECRET, apiKey: API_KEY, logger: false }, () => ({
      protocol: h.protocol,
      markets: h.markets,
      funds: h.funds,
      priceOracle: h.priceOracle,
      operatorAddress: MANAGER,
    }));
    app = built.app;
  });

  afterEach(async () => {
    await app.close();
  });

  async function proposeOverHttp(): Promise<void> {
    const commit = await app.inject({
      method: "POST",
      url: `${BASE}/commit`,
      headers: bearer(PROPOSER),
      payload: {
        commitHash: resolutionCommitment(1, EVIDENCE_URI, EVIDENCE_HASH, SALT, PROPOSER),
        value: "100000000000000000",
      },
    });
    expect(commit.statusCode).toBe(201);
    h.clock.advance(300);
    const proposal = await app.inject({
      method: "POST",
      url: `${BASE}/propose`,
      headers: bearer(PROPOSER),
      payload: { outcome: 1, evidenceUri: EVIDENCE_URI, evidenceHash: EVIDENCE_HASH, salt: SALT, value: "1000000000000000000" },
    });
    expect(proposal.statusCode).toBe(201);
  }

  it("answers the health check", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("requires authentication for protocol calls", async () => {
    const res = await app.inject({ method: "POST", url: `${BASE}/support`, payload: { value: "1000000000000000000" } });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "Authentication required" });
  });

  it("commits and reveals as the authenticated participant", async () => {
    const commit = await app.inject({
      method: "POST",
      url: `${BASE}/commit`,
      headers: { cookie: `${AUTH_COOKIE_NAME}=${signToken(PROPOSER, JWT_SECRET)}` },
      payload: {
        commitHash: resolutionCommitment(1, EVIDENCE_URI, EVIDENCE_HASH, SALT, PROPOSER),
        value: "100000000000000000",
      },
    });
    expect(commit.statusCode).toBe(201);
    expect(commit.json().data).toMatchObject({ committer: PROPOSER, committedAt: T0, bond: "100000000000000000" });

    h.clock.advance(300);
    const proposal = await app.inject({
      method: "POST",
      url: `${BASE}/propose`,
      headers: bearer(PROPOSER),
      payload: { outcome: 1, evidenceUri: EVIDENCE_URI, evidenceHash: EVIDENCE_HASH, salt: SALT, value: "1000000000000000000" },
    });
    expect(proposal.statusCode).toBe(201);
    expect(proposal.json().data).toMatchObject({
      status: "PENDING",
      supportStake: "1000000000000000000",
      weightedSupportStake: "1050000000000000000",
    });

    const view = await app.inject({ method: "GET", url: BASE });
    expect(view.statusCode).toBe(200);
    const data = view.json().data;
    expect(data.rounds).toBe(1);
    expect(data.roster).toHaveLength(3);
    expect(data.earmarked).toBe("1000000000000000000");
    expect(data.price).toBeNull();
  });

  it("rejects malformed bodies", async () => {
    const res = await app.inject({
      method: "POST",
      url: `${BASE}/support`,
      headers: bearer(PROPOSER),
      payload: { value: "1.5" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Validation failed");
  });

  it("maps protocol errors to status codes", async () => {
    const missing = await app.inject({
      method: "POST",
      url: `${BASE}/support`,
      headers: bearer(PROPOSER),
      payload: { value: "1000000000000000000" },
    });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: `No resolution for market ${MARKET}`, code: "NOT_FOUND" });

    await proposeOverHttp();
    const early = await app.inject({ method: "POST", url: `${BASE}/finalize`, headers: bearer(PROPOSER) });
    expect(early.statusCode).toBe(400);
    expect(early.json()).toEqual({ error: "Dispute window is still open", code: "WINDOW_CLOSED" });
  });

  it("files and lists disputes", async () => {
    await proposeOverHttp();
    expect((await app.inject({ method: "GET", url: `${BASE}/dispute-bond` })).json()).toEqual({
      data: { requiredBond: "2000000000000000000" },
    });

    const filed = await app.inject({
      method: "POST",
      url: `/api/markets/${MARKET}/disputes`,
      headers: bearer(CHALLENGER),
      payload: {
        alternativeOutcome: 0,
        evidenceUri: "ipfs://counter-evidence",
        evidenceHash: EVIDENCE_HASH,
        value: "2000000000000000000",
      },
    });
    expect(filed.statusCode).toBe(201);
    expect(filed.json().data).toMatchObject({ index: 0, challenger: CHALLENGER, status: "ACTIVE" });

    const listed = await app.inject({ method: "GET", url: `/api/markets/${MARKET}/disputes` });
    expect(listed.json().data).toHaveLength(1);
  });

  it("acts as the operator address for API-key calls", async () => {
    await proposeOverHttp();
    await app.inject({
      method: "POST",
      url: `${BASE}/evidence-challenges`,
      headers: bearer(CHALLENGER),
      payload: { reason: "Wrong source", value: "500000000000000000" },
    });

    const resolved = await app.inject({
      method: "POST",
      url: `${BASE}/evidence-challenges/0/resolve`,
      headers: { "x-api-key": API_KEY },
      payload: { upheld: false },
    });
    expect(resolved.statusCode).toBe(200);
    expect(resolved.json()).toEqual({ data: { payout: "500000000000000000" } });
  });
});

describe("operator routes", () => {
  let h: Harness;
  let app: FastifyInstance;

  beforeEach(async () => {
    h = createHarness();
    const built = await buildApp({ jwtSecret: JWT_SECRET, apiKey: API_KEY, logger: false }, () => ({
      protocol: h.protocol,
      markets: h.markets,
      funds: h.funds,
      priceOracle: h.priceOracle,
      operatorAddress: MANAGER,
    }));
    app = built.app;
  });

  afterEach(async () => {
    await app.close();
  });

  it("refuses participants", async () => {
    const res = await app.inject({ method: "GET", url: "/api/internal/markets", headers: bearer(PROPOSER) });
    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({ error: "API key required" });
  });

  it("registers markets and credits accounts", async () => {
    const registered = await app.inject({
      method: "POST",
      url: "/api/internal/markets",
      headers: { "x-api-key": API_KEY },
      payload: { marketId: "market-2", tradingEnd: T0, resolutionTime: T0, outcomeCount: 3 },
    });
    expect(registered.statusCode).toBe(201);
    expect(registered.json().data).toMatchObject({ marketId: "market-2", state: "TRADING", totalStake: "0" });

    const moved = await app.inject({
      method: "POST",
      url: "/api/internal/markets/market-2/state",
      headers: { "x-api-key": API_KEY },
      payload: { state: "SETTLEMENT" },
    });
    expect(moved.json().data.state).toBe("SETTLEMENT");

    const credited = await app.inject({
      method: "POST",
      url: `/api/internal/accounts/${MANAGER}/credit`,
      headers: { "x-api-key": API_KEY },
      payload: { amount: "5" },
    });
    expect(credited.json()).toEqual({ data: { address: MANAGER, balance: "5" } });
  });

  it("withdraws fees as the operator and reports the treasury", async () => {
    const refused = await app.inject({
      method: "POST",
      url: "/api/treasury/withdraw",
      headers: { "x-api-key": API_KEY },
      payload: { to: MANAGER, amount: "1" },
    });
    expect(refused.statusCode).toBe(409);
    expect(refused.json()).toEqual({ error: "Fee balance 0 cannot cover 1", code: "INSOLVENT" });

    const treasury = await app.inject({ method: "GET", url: "/api/treasury" });
    expect(treasury.json().data).toMatchObject({
      treasury: { custodied: "0", earmarked: "0", protocolFees: "0", unallocated: "0" },
      finalizable: [],
    });
  });
});
