// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/services/settlement`
 * Purpose: Compute a round's reward settlement: generated amounts, per-group rewards and recipient shares.
 * Scope: Pure reads over verification snapshots, distrust tallies, roster and pool. Does not mint, transfer or record.
 * Invariants:
 * - groupReward = pool * generated / totalGenerated, 0 for ineligible owners; ineligible generation still counts in the denominator.
 * - distributed <= pool, so the burn never goes negative.
 * Side-effects: none
 * @internal
 */

import type { Address } from "viem";

import {
  type Activity,
  computeVerifiedAmount,
  generatedAmount,
  type GroupVerification,
  proportionalReward,
  type Round,
  splitReward,
} from "@/core";
import { distrustReductionByGroup } from "@/features/distrust/public";
import type {
  GroupSettlement,
  RewardReadDeps,
  RoundSettlement,
} from "../types";

/** Groups of any activity under the service token are rewarded */
export function isInServiceScope(
  deps: Pick<RewardReadDeps, "config">,
  activity: Activity
): boolean {
  return activity.tokenAddress === deps.config.serviceActivity.tokenAddress;
}

/** On the roster at `round` and not exited by it */
export function isOwnerEligible(
  deps: Pick<RewardReadDeps, "roster">,
  owner: Address,
  round: Round
): boolean {
  return (
    deps.roster.isAccountOnRosterAtRound(owner, round) &&
    !deps.roster.hasExitedByRound(owner, round)
  );
}

/** verifiedAmount scaled by the group's distrust reduction */
export function generatedOf(
  deps: RewardReadDeps,
  verification: GroupVerification
): bigint {
  return generatedAmount(
    computeVerifiedAmount(verification.entries),
    distrustReductionByGroup(deps, verification.groupId, verification.round)
  );
}

export function scopedVerifications(
  deps: RewardReadDeps,
  round: Round
): GroupVerification[] {
  return deps.verifications
    .verificationsInRound(round)
    .filter((v) => isInServiceScope(deps, v.activity));
}

export function settleRound(
  deps: RewardReadDeps,
  round: Round
): RoundSettlement {
  const pool = deps.rewardPool.totalServiceReward(
    deps.config.serviceActivity,
    round
  );
  const generated = scopedVerifications(deps, round).map((verification) => ({
    verification,
    generated: generatedOf(deps, verification),
  }));
  const totalGenerated = generated.reduce((sum, g) => sum + g.generated, 0n);

  const groups: GroupSettlement[] = generated.map((g) => {
    const { owner, activity, groupId } = g.verification;
    const eligible = isOwnerEligible(deps, owner, round);
    const reward = eligible
      ? proportionalReward(pool, g.generated, totalGenerated)
      : 0n;
    const split = deps.recipients.splitAt(owner, activity, groupId, round);
    return {
      ...g,
      eligible,
      reward,
      split,
      shares: splitReward(reward, split),
    };
  });

  return {
    round,
    pool,
    totalGenerated,
    groups,
    distributed: groups.reduce((sum, g) => sum + g.reward, 0n),
  };
}

/** Owner residuals of groups `account` owned plus recipient shares it receives */
export function accountRewardIn(
  settlement: RoundSettlement,
  account: Address
): bigint {
  let total = 0n;
  for (const group of settlement.groups) {
    if (group.verification.owner === account) {
      total += group.shares.ownerAmount;
    }
    group.split.forEach((share, i) => {
      if (share.recipient === account) {
        total += group.shares.amounts[i] ?? 0n;
      }
    });
  }
  return total;
}
