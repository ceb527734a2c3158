// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/reward-pool`
 * Purpose: Reward pool collaborator: per-round pool size, payouts and burn.
 * Scope: Defines minting/custody contract. Does not contain implementations or reward math.
 * Invariants:
 * - prepareRewardIfNeeded is idempotent; totalServiceReward is 0 until the round's reward is minted.
 * - transfer and burn throw on failure and change nothing in that case.
 * Side-effects: none (interface definition only)
 * @public
 */

import type { Address } from "viem";

import type { Activity, Round } from "@/core";

export interface RewardPoolPort {
  /** Mint the round's service reward if that has not happened yet */
  prepareRewardIfNeeded(activity: Activity, round: Round): void;
  totalServiceReward(activity: Activity, round: Round): bigint;
  /** Pay `amount` from the held balance to `to` */
  transfer(to: Address, amount: bigint): void;
  /** Destroy `amount` of the held balance */
  burn(amount: bigint): void;
}
