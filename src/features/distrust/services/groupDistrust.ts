// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/distrust/services/groupDistrust`
 * Purpose: Quota-bounded distrust voting and the per-group distrust rate/reduction.
 * Scope: Validates and records votes for the current round; derives rate/reduction from the round's verification snapshot.
 * Invariants:
 * - Cumulative distrust a voter casts in (activity, round) never exceeds the voter's quota.
 * - Rate and reduction attach to the owner snapshotted by the round's verification, not the live owner.
 * Side-effects: IO (logging)
 * @public
 */

import type { Address } from "viem";

import {
  type Activity,
  activityKey,
  assertDistrustVoteShape,
  assertWithinQuota,
  type DistrustInputs,
  type DistrustVote,
  distrustRate,
  distrustReduction,
  type GroupId,
  NoActiveGroupsError,
  type Round,
  ZeroAddressError,
} from "@/core";
import { EVENT_NAMES, logEvent } from "@/shared/observability";
import { isZeroAccount, toAccount, toActivity } from "@/shared/web3";
import type { DistrustDeps, DistrustReadDeps, DistrustVoteInput } from "../types";

/**
 * Add `amount` of distrust from `voter` against `target` in the current round.
 * @returns the voter's cumulative vote against the target, carrying the latest reason
 * @throws ZeroAddressError | DistrustVoteZeroAmountError | InvalidReasonError | NoActiveGroupsError
 * @throws VerifyVotesZeroError | DistrustVoteExceedsVerifyVotesError
 */
export function distrustVote(
  deps: DistrustDeps,
  input: DistrustVoteInput
): DistrustVote {
  const { groups, governance, distrust, clock, log } = deps;
  const { amount, reason } = input;
  const activity = toActivity(input.activity);
  const voter = toAccount(input.voter);
  const target = toAccount(input.target);

  if (isZeroAccount(target)) {
    throw new ZeroAddressError("target");
  }
  assertDistrustVoteShape(amount, reason);
  if (groups.activeGroupIdsByOwner(activity, target).length === 0) {
    throw new NoActiveGroupsError(target);
  }

  const round = clock.currentRound();
  assertWithinQuota({
    voter,
    round,
    amount,
    alreadyCast: distrust.votesByVoter(activity, round, voter),
    quota: governance.verifierQuota(activity, round, voter),
  });

  const vote = distrust.record({
    activity,
    round,
    voter,
    target,
    amount,
    reason,
  });

  logEvent(log, EVENT_NAMES.DISTRUST_VOTED, {
    round: round.toString(),
    activity: activityKey(activity),
    voter,
    target,
    amount: amount.toString(),
    cumulative: vote.amount.toString(),
  });

  return vote;
}

/** Rate/reduction inputs for a group in a round, read from its verification snapshot */
export function distrustInputsOf(
  deps: DistrustReadDeps,
  groupId: GroupId,
  round: Round
): DistrustInputs {
  const verification = deps.verifications.verificationOf(groupId, round);
  if (!verification) {
    return { verified: false, distrustVotes: 0n, totalVotes: 0n };
  }
  const { activity, owner } = verification;
  return {
    verified: true,
    distrustVotes: deps.distrust.totalAgainst(activity, round, owner),
    totalVotes: deps.governance.totalVotesForActivity(activity, round),
  };
}

/** against(owner) * PRECISION / totalVotes; 0 when unverified or no votes */
export function distrustRateByGroup(
  deps: DistrustReadDeps,
  groupId: GroupId,
  round: Round
): bigint {
  return distrustRate(distrustInputsOf(deps, groupId, round));
}

/** PRECISION - rate; PRECISION when unverified or no votes */
export function distrustReductionByGroup(
  deps: DistrustReadDeps,
  groupId: GroupId,
  round: Round
): bigint {
  return distrustReduction(distrustInputsOf(deps, groupId, round));
}

/** Distrust `voter` has cast in (activity, round) across all targets */
export function distrustVotesByVoter(
  deps: Pick<DistrustReadDeps, "distrust">,
  activity: Activity,
  round: Round,
  voter: string
): bigint {
  return deps.distrust.votesByVoter(
    toActivity(activity),
    round,
    toAccount(voter)
  );
}

export function distrustVotesByVoterByTarget(
  deps: Pick<DistrustReadDeps, "distrust">,
  activity: Activity,
  round: Round,
  voter: string,
  target: string
): { amount: bigint; reason: string } {
  const vote = deps.distrust.votesByVoterByTarget(
    toActivity(activity),
    round,
    toAccount(voter),
    toAccount(target)
  );
  return { amount: vote?.amount ?? 0n, reason: vote?.reason ?? "" };
}

export function totalDistrustVotes(
  deps: Pick<DistrustReadDeps, "distrust">,
  activity: Activity,
  round: Round,
  target: string
): bigint {
  return deps.distrust.totalAgainst(
    toActivity(activity),
    round,
    toAccount(target)
  );
}

/** Voters against `target`, in first-vote order */
export function distrustVotersByTarget(
  deps: Pick<DistrustReadDeps, "distrust">,
  activity: Activity,
  round: Round,
  target: string
): Address[] {
  return deps.distrust.votersByTargetOf(
    toActivity(activity),
    round,
    toAccount(target)
  );
}
