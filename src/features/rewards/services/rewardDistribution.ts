// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/services/rewardDistribution`
 * Purpose: Reward queries per group, owner, recipient and account, and the idempotent claim.
 * Scope: Reads the round settlement; claim prepares the pool, transfers and records. Does not burn.
 * Invariants:
 * - CLAIM_AFTER_ROUND: only rounds before the clock's current round are claimable.
 * - CLAIM_ONCE: a second claim for (round, account) throws AlreadyClaimedError.
 * - The claim record is written only after the transfer succeeds.
 * Side-effects: IO (pool transfer, logging)
 * @public
 */

import {
  AlreadyClaimedError,
  type GroupId,
  type RewardDistribution,
  type RewardInfo,
  type Round,
  RoundNotFinishedError,
  splitReward,
} from "@/core";
import {
  EVENT_NAMES,
  logEvent,
  type RewardClaimedEvent,
} from "@/shared/observability";
import { toAccount } from "@/shared/web3";
import type { ClaimRewardInput, RewardDeps, RewardReadDeps } from "../types";
import {
  accountRewardIn,
  generatedOf,
  isInServiceScope,
  scopedVerifications,
  settleRound,
} from "./settlement";

/** Generated amount of one group; 0 when unverified or outside the service token */
export function generatedByGroup(
  deps: RewardReadDeps,
  groupId: GroupId,
  round: Round
): bigint {
  const verification = deps.verifications.verificationOf(groupId, round);
  if (!verification || !isInServiceScope(deps, verification.activity)) {
    return 0n;
  }
  return generatedOf(deps, verification);
}

/** Sum of generated amounts over the groups `owner` verified as owner in `round` */
export function generatedByVerifier(
  deps: RewardReadDeps,
  round: Round,
  owner: string
): bigint {
  const ownerAccount = toAccount(owner);
  return scopedVerifications(deps, round)
    .filter((v) => v.owner === ownerAccount)
    .reduce((sum, v) => sum + generatedOf(deps, v), 0n);
}

export function totalGeneratedReward(
  deps: RewardReadDeps,
  round: Round
): bigint {
  return scopedVerifications(deps, round).reduce(
    (sum, v) => sum + generatedOf(deps, v),
    0n
  );
}

/** Owner's reward before splits: the sum of its group rewards */
export function rewardByVerifier(
  deps: RewardReadDeps,
  round: Round,
  owner: string
): bigint {
  const ownerAccount = toAccount(owner);
  return settleRound(deps, round)
    .groups.filter((g) => g.verification.owner === ownerAccount)
    .reduce((sum, g) => sum + g.reward, 0n);
}

/** Recipients, shares and amounts of one group's reward in `round` */
export function rewardDistribution(
  deps: RewardReadDeps,
  round: Round,
  owner: string,
  groupId: GroupId
): RewardDistribution {
  const ownerAccount = toAccount(owner);
  const settled = settleRound(deps, round).groups.find(
    (g) =>
      g.verification.groupId === groupId &&
      g.verification.owner === ownerAccount
  );

  if (settled) {
    return {
      recipients: settled.split.map((s) => s.recipient),
      basisPoints: settled.split.map((s) => s.basisPoints),
      amounts: settled.shares.amounts,
      ownerAmount: settled.shares.ownerAmount,
    };
  }

  const activity = deps.groups.activityOf(groupId);
  const split = activity
    ? deps.recipients.splitAt(ownerAccount, activity, groupId, round)
    : [];
  const shares = splitReward(0n, split);
  return {
    recipients: split.map((s) => s.recipient),
    basisPoints: split.map((s) => s.basisPoints),
    amounts: shares.amounts,
    ownerAmount: shares.ownerAmount,
  };
}

/** Amount `recipient` gets from one group; the owner as recipient gets the residual */
export function rewardByRecipient(
  deps: RewardReadDeps,
  round: Round,
  owner: string,
  groupId: GroupId,
  recipient: string
): bigint {
  const target = toAccount(recipient);
  const distribution = rewardDistribution(deps, round, owner, groupId);
  if (target === toAccount(owner)) {
    return distribution.ownerAmount;
  }
  const index = distribution.recipients.indexOf(target);
  return index === -1 ? 0n : (distribution.amounts[index] ?? 0n);
}

/**
 * Reward of `account` in `round` across every group, with its claim status.
 * A claimed round returns the amount recorded at claim time.
 */
export function rewardByAccount(
  deps: RewardReadDeps,
  round: Round,
  account: string
): RewardInfo {
  const target = toAccount(account);
  const record = deps.rewardLedger.rewardRecord(round, target);
  if (record.status === "claimed") {
    return { amount: record.amount, claimed: true };
  }
  return {
    amount: accountRewardIn(settleRound(deps, round), target),
    claimed: false,
  };
}

/**
 * Pay out the account's reward for a finished round and record the claim.
 * @throws RoundNotFinishedError | AlreadyClaimedError
 */
export function claimReward(
  deps: RewardDeps,
  input: ClaimRewardInput
): RewardInfo {
  const { clock, rewardPool, rewardLedger, config, log } = deps;
  const { round } = input;
  const account = toAccount(input.account);

  const currentRound = clock.currentRound();
  if (round >= currentRound) {
    throw new RoundNotFinishedError(round, currentRound);
  }
  if (rewardLedger.rewardRecord(round, account).status === "claimed") {
    throw new AlreadyClaimedError(round, account);
  }

  rewardPool.prepareRewardIfNeeded(config.serviceActivity, round);
  const amount = accountRewardIn(settleRound(deps, round), account);
  if (amount > 0n) {
    rewardPool.transfer(account, amount);
  }
  const record = rewardLedger.markClaimed(round, account, amount);

  logEvent(log, EVENT_NAMES.REWARD_CLAIMED, {
    round: round.toString(),
    account,
    amount: amount.toString(),
  } satisfies RewardClaimedEvent);

  return { amount: record.amount, claimed: true };
}
