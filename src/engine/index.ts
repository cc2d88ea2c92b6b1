export { ResolutionProtocol, systemClock } from "./resolution/resolution-protocol.js";
export type { ProtocolEventListener, ResolutionProtocolOptions } from "./resolution/resolution-protocol.js";
export type { ProposeInput } from "./resolution/proposal-engine.js";
export type { DisputeInput } from "./resolution/dispute-engine.js";
export type { StakeSide } from "./resolution/staking-ledger.js";
export type { FinalizableRound } from "./resolution/finalization.js";
export type { TreasurySnapshot } from "./resolution/treasury-ledger.js";

export { ProtocolError, ValidationError, SolvencyError, ReentrancyError } from "./resolution/errors.js";
export type { ProtocolErrorCode } from "./resolution/errors.js";

export { resolutionCommitment, legislatorVoteCommitment } from "./resolution/commitments.js";
export { computeScore, integerSqrt, selectWinningDispute } from "./resolution/dispute-scoring.js";
export { stakerTimingBonus, proposerTimingBonus, requiredDisputeBond } from "./resolution/timing-bonus.js";
export * as constants from "./resolution/constants.js";
