/**
 * Treasury accounting: custodied funds versus funds earmarked for participants.
 *
 * Invariant: custodied >= earmarked. It is checked on entry to every value-moving
 * method; counters are never mutated outside this class.
 *
 * Incoming value is collected immediately. Outgoing transfers are queued and only reach
 * the funds gateway through `settleTransfers`, once the operation has succeeded.
 */

import type { Address } from "viem";
import { SolvencyError, ValidationError } from "./errors.js";
import type { ProtocolState } from "./protocol-state.js";
import type { FundsGateway } from "../../types/collaborators.js";

export interface TreasurySnapshot {
  custodied: bigint;
  earmarked: bigint;
  protocolFees: bigint;
  /** Custody not owed to anyone: protocol fees plus rounding dust. */
  unallocated: bigint;
}

interface OutgoingTransfer {
  to: Address;
  amount: bigint;
}

export class TreasuryLedger {
  private outgoing: OutgoingTransfer[] = [];

  constructor(
    private readonly state: ProtocolState,
    private readonly funds: FundsGateway
  ) {}

  assertSolvent(): void {
    const { custodied, earmarked } = this.state.treasury;
    if (custodied < earmarked) {
      throw new SolvencyError(`Ledger insolvent: custodied ${custodied} < earmarked ${earmarked}`);
    }
  }

  earmarkedFor(marketId: string): bigint {
    return this.state.treasury.earmarkedByMarket.get(marketId) ?? 0n;
  }

  /** Pull `amount` from `from` into custody and earmark it for the market. */
  receive(marketId: string, from: Address, amount: bigint): void {
    this.assertSolvent();
    if (amount <= 0n) throw new ValidationError("Amount must be positive");
    this.funds.collect(from, amount);
    const treasury = this.state.treasury;
    treasury.custodied += amount;
    treasury.earmarked += amount;
    treasury.earmarkedByMarket.set(marketId, this.earmarkedFor(marketId) + amount);
  }

  /** Pay earmarked funds of a market out of custody. */
  release(marketId: string, to: Address, amount: bigint): void {
    this.assertSolvent();
    if (amount <= 0n) throw new ValidationError("Nothing to pay out");
    this.unearmark(marketId, amount);
    const treasury = this.state.treasury;
    if (treasury.custodied < amount) {
      throw new SolvencyError(`Custody ${treasury.custodied} cannot cover payout ${amount}`);
    }
    treasury.custodied -= amount;
    this.state.metrics.totalPaidOut += amount;
    this.outgoing.push({ to, amount });
  }

  /** Move earmarked funds to the protocol fee balance. */
  collectFee(marketId: string, amount: bigint): void {
    if (amount === 0n) return;
    this.assertSolvent();
    this.unearmark(marketId, amount);
    this.state.treasury.protocolFees += amount;
    this.state.metrics.totalFeesCollected += amount;
  }

  /** Move earmarked funds of a slashed participant to the protocol fee balance. */
  forfeit(marketId: string, amount: bigint): void {
    if (amount === 0n) return;
    this.assertSolvent();
    this.unearmark(marketId, amount);
    this.state.treasury.protocolFees += amount;
    this.state.metrics.totalSlashed += amount;
  }

  withdrawFees(to: Address, amount: bigint): void {
    this.assertSolvent();
    const treasury = this.state.treasury;
    if (amount <= 0n) throw new ValidationError("Amount must be positive");
    if (amount > treasury.protocolFees) {
      throw new SolvencyError(`Fee balance ${treasury.protocolFees} cannot cover ${amount}`);
    }
    if (treasury.custodied - amount < treasury.earmarked) {
      throw new SolvencyError("Withdrawal would leave earmarked funds uncovered");
    }
    treasury.protocolFees -= amount;
    treasury.custodied -= amount;
    this.outgoing.push({ to, amount });
  }

  /** Send queued transfers through the funds gateway; a failed transfer throws. */
  settleTransfers(): void {
    const queued = this.outgoing;
    this.outgoing = [];
    for (const { to, amount } of queued) {
      this.funds.transfer(to, amount);
    }
  }

  discardTransfers(): void {
    this.outgoing = [];
  }

  snapshot(): TreasurySnapshot {
    const { custodied, earmarked, protocolFees } = this.state.treasury;
    return { custodied, earmarked, protocolFees, unallocated: custodied - earmarked };
  }

  private unearmark(marketId: string, amount: bigint): void {
    const available = this.earmarkedFor(marketId);
    if (amount > available) {
      throw new SolvencyError(`Market ${marketId} has ${available} earmarked, cannot cover ${amount}`);
    }
    const treasury = this.state.treasury;
    treasury.earmarked -= amount;
    treasury.earmarkedByMarket.set(marketId, available - amount);
  }
}
