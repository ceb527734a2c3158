// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/rewards/fake-reward-pool`
 * Purpose: In-memory reward pool with lazy per-round minting for deterministic testing.
 * Scope: Tracks minted rewards, held balance, transfers and burns. Does not talk to a token contract.
 * Invariants:
 * - A scheduled round reward is minted once, on the first prepareRewardIfNeeded for that round.
 * - transfer/burn throw without changing state when the held balance is insufficient.
 * Side-effects: none (in-memory only)
 * Notes: scheduleRoundReward defers minting to prepare; mintRoundReward mints immediately. Tracks calls for assertions.
 * Links: Implements RewardPoolPort
 * @public
 */

import type { Address } from "viem";

import { type Activity, activityKey, type Round } from "@/core";
import type { RewardPoolPort } from "@/ports";

const scope = (activity: Activity, round: Round) =>
  `${activityKey(activity)}@${round}`;

export class FakeRewardPoolAdapter implements RewardPoolPort {
  private scheduled = new Map<string, bigint>();
  private minted = new Map<string, bigint>();

  public balance = 0n;
  public burned = 0n;

  // Call tracking for assertions
  public transfers: Array<{ to: Address; amount: bigint }> = [];
  public burnCalls: bigint[] = [];
  public prepareCalls: Array<{ activity: Activity; round: Round }> = [];

  /** Reward minted on the next prepareRewardIfNeeded for the round */
  scheduleRoundReward(activity: Activity, round: Round, amount: bigint): void {
    this.scheduled.set(scope(activity, round), amount);
  }

  /** Reward minted right away; visible to queries before any claim */
  mintRoundReward(activity: Activity, round: Round, amount: bigint): void {
    const key = scope(activity, round);
    this.minted.set(key, (this.minted.get(key) ?? 0n) + amount);
    this.balance += amount;
  }

  reset(): void {
    this.scheduled.clear();
    this.minted.clear();
    this.balance = 0n;
    this.burned = 0n;
    this.transfers = [];
    this.burnCalls = [];
    this.prepareCalls = [];
  }

  prepareRewardIfNeeded(activity: Activity, round: Round): void {
    this.prepareCalls.push({ activity, round });
    const key = scope(activity, round);
    const amount = this.scheduled.get(key);
    if (amount === undefined) return;
    this.scheduled.delete(key);
    this.mintRoundReward(activity, round, amount);
  }

  totalServiceReward(activity: Activity, round: Round): bigint {
    return this.minted.get(scope(activity, round)) ?? 0n;
  }

  transfer(to: Address, amount: bigint): void {
    this.debit(amount);
    this.transfers.push({ to, amount });
  }

  burn(amount: bigint): void {
    this.debit(amount);
    this.burned += amount;
    this.burnCalls.push(amount);
  }

  private debit(amount: bigint): void {
    if (amount > this.balance) {
      throw new Error(
        `FakeRewardPoolAdapter: insufficient balance ${this.balance} for ${amount}`
      );
    }
    this.balance -= amount;
  }
}

let _testInstance: FakeRewardPoolAdapter | null = null;

export function getTestRewardPool(): FakeRewardPoolAdapter {
  if (!_testInstance) {
    _testInstance = new FakeRewardPoolAdapter();
  }
  return _testInstance;
}

export function resetTestRewardPool(): void {
  if (_testInstance) {
    _testInstance.reset();
  }
}
