// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rewards/reward-ledger`
 * Purpose: Write-once claim and burn records per round.
 * Scope: In-memory records. Does not compute rewards.
 * Invariants:
 * - CLAIM_ONCE: a (round, account) record moves to "claimed" exactly once.
 * - BURN_ONCE: a round's burn record moves to "burned" exactly once.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import type { Round } from "../activity/model";
import { AlreadyClaimedError } from "./errors";
import type { BurnRecord, RewardRecord } from "./model";

const UNCLAIMED: RewardRecord = { amount: 0n, status: "unclaimed" };
const UNBURNED: BurnRecord = { amount: 0n, status: "unburned" };

export class RewardLedger {
  private readonly rewards = new Map<Round, Map<Address, RewardRecord>>();
  private readonly burns = new Map<Round, BurnRecord>();

  rewardRecord(round: Round, account: Address): RewardRecord {
    return this.rewards.get(round)?.get(account) ?? UNCLAIMED;
  }

  /** @throws AlreadyClaimedError when the record is already claimed */
  markClaimed(round: Round, account: Address, amount: bigint): RewardRecord {
    if (this.rewardRecord(round, account).status === "claimed") {
      throw new AlreadyClaimedError(round, account);
    }
    let records = this.rewards.get(round);
    if (!records) {
      records = new Map();
      this.rewards.set(round, records);
    }
    const record: RewardRecord = { amount, status: "claimed" };
    records.set(account, record);
    return record;
  }

  burnRecord(round: Round): BurnRecord {
    return this.burns.get(round) ?? UNBURNED;
  }

  /** @returns false when the round was already burned (record untouched) */
  markBurned(round: Round, amount: bigint): boolean {
    if (this.burnRecord(round).status === "burned") return false;
    this.burns.set(round, { amount, status: "burned" });
    return true;
  }
}
