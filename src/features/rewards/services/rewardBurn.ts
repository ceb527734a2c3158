// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/services/rewardBurn`
 * Purpose: Burn the part of a finished round's pool no group reward absorbed.
 * Scope: Prepares the pool, computes pool - distributed, burns and records. Does not pay claims.
 * Invariants:
 * - BURN_CONSERVATION: burned + sum(group rewards) == pool for a burned round.
 * - BURN_ONCE: a burned round is never burned again; repeat calls return the stored record.
 * - A zero burn writes no record, so a later mint for the round can still be burned.
 * Side-effects: IO (pool burn, logging)
 * @public
 */

import {
  type BurnInfo,
  burnAmount,
  type Round,
  RoundNotFinishedError,
} from "@/core";
import {
  EVENT_NAMES,
  logEvent,
  type RewardBurnedEvent,
  type RewardBurnSkippedEvent,
} from "@/shared/observability";
import type { RewardDeps, RewardReadDeps } from "../types";
import { settleRound } from "./settlement";

/** Stored burn when the round was burned, otherwise the prospective amount */
export function burnInfo(deps: RewardReadDeps, round: Round): BurnInfo {
  const record = deps.rewardLedger.burnRecord(round);
  if (record.status === "burned") {
    return { amount: record.amount, burned: true };
  }
  const settlement = settleRound(deps, round);
  return {
    amount: burnAmount(settlement.pool, settlement.distributed),
    burned: false,
  };
}

/**
 * Burn the round's undistributed reward once.
 * @throws RoundNotFinishedError
 */
export function burnRewardIfNeeded(deps: RewardDeps, round: Round): BurnInfo {
  const { clock, rewardPool, rewardLedger, config, log } = deps;

  const currentRound = clock.currentRound();
  if (round >= currentRound) {
    throw new RoundNotFinishedError(round, currentRound);
  }

  const existing = rewardLedger.burnRecord(round);
  if (existing.status === "burned") {
    logEvent(log, EVENT_NAMES.REWARD_BURN_SKIPPED, {
      round: round.toString(),
      reason: "already_burned",
    } satisfies RewardBurnSkippedEvent);
    return { amount: existing.amount, burned: true };
  }

  rewardPool.prepareRewardIfNeeded(config.serviceActivity, round);
  const settlement = settleRound(deps, round);
  const amount = burnAmount(settlement.pool, settlement.distributed);

  if (amount === 0n) {
    logEvent(log, EVENT_NAMES.REWARD_BURN_SKIPPED, {
      round: round.toString(),
      reason: "nothing_to_burn",
    } satisfies RewardBurnSkippedEvent);
    return { amount: 0n, burned: false };
  }

  rewardPool.burn(amount);
  rewardLedger.markBurned(round, amount);

  logEvent(log, EVENT_NAMES.REWARD_BURNED, {
    round: round.toString(),
    amount: amount.toString(),
    pool: settlement.pool.toString(),
  } satisfies RewardBurnedEvent);

  return { amount, burned: true };
}
