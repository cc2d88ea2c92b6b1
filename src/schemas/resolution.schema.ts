import { z } from "zod";

const bytes32 = z.string().regex(/^0x[0-9a-fA-F]{64}$/, "Expected a 32-byte hex string");
const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "Expected an address");

/** Decimal wei string, e.g. "1000000000000000000". */
export const weiSchema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal wei amount")
  .transform((v) => BigInt(v));

const optionalWei = weiSchema.optional();

export const marketParamsSchema = z.object({
  marketId: z.string().min(1).max(128),
});

export const indexParamsSchema = marketParamsSchema.extend({
  index: z.coerce.number().int().min(0),
});

export const committerParamsSchema = marketParamsSchema.extend({
  committer: address,
});

export const legislatorParamsSchema = marketParamsSchema.extend({
  legislator: address,
});

export const roundQuerySchema = z.object({
  round: z.coerce.number().int().min(0).optional(),
});

export const valueBodySchema = z.object({
  value: optionalWei,
});

export const roundBodySchema = z.object({
  round: z.number().int().min(0).optional(),
});

export const commitBodySchema = z.object({
  commitHash: bytes32,
  value: weiSchema,
});

export const proposeBodySchema = z.object({
  outcome: z.number().int().min(0),
  evidenceUri: z.string().min(1),
  evidenceHash: bytes32,
  salt: bytes32,
  value: weiSchema,
});

export const stakeBodySchema = z.object({
  value: weiSchema,
});

export const evidenceChallengeBodySchema = z.object({
  reason: z.string().min(1),
  value: weiSchema,
});

export const resolveChallengeBodySchema = z.object({
  upheld: z.boolean(),
  round: z.number().int().min(0).optional(),
});

export const voteCommitBodySchema = z.object({
  commitHash: bytes32,
});

export const voteRevealBodySchema = z.object({
  support: z.boolean(),
  salt: bytes32,
});

export const disputeBodySchema = z.object({
  alternativeOutcome: z.number().int().min(0),
  evidenceUri: z.string().min(1),
  evidenceHash: bytes32,
  value: weiSchema,
});

export const withdrawFeesBodySchema = z.object({
  to: address,
  amount: weiSchema,
});

const resolutionStateEnum = z.enum(["TRADING", "SETTLEMENT", "PROPOSED", "DISPUTE_WINDOW", "DISPUTED", "FINALIZED"]);

export const registerMarketBodySchema = z.object({
  marketId: z.string().min(1).max(128),
  tradingEnd: z.number().int().min(0),
  resolutionTime: z.number().int().min(0),
  outcomeCount: z.number().int().min(2).max(256),
  totalStake: optionalWei,
  state: resolutionStateEnum.optional(),
  priceFeedId: z.string().min(1).optional(),
  priceAsset: z.string().min(1).optional(),
});

export const marketStateBodySchema = z.object({
  state: resolutionStateEnum,
});

export const creditParamsSchema = z.object({
  address,
});

export const creditBodySchema = z.object({
  amount: weiSchema,
});

export type ProposeBody = z.infer<typeof proposeBodySchema>;
export type DisputeBody = z.infer<typeof disputeBodySchema>;
export type RegisterMarketBody = z.infer<typeof registerMarketBodySchema>;
