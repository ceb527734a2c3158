// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/distrust/rules`
 * Purpose: Distrust vote validation and the rate/reduction formulas.
 * Scope: Pure functions with BIGINT arithmetic. Does not perform I/O or mutate state.
 * Invariants:
 * - QUOTA_BOUND: alreadyCast + amount <= quota for every accepted vote.
 * - REDUCTION_DUALITY: rate + reduction == PRECISION when verified and totalVotes > 0.
 * - Unverified or zero-total inputs give rate 0 and reduction PRECISION.
 * - Rate is capped at PRECISION when distrust reaches the total.
 * Side-effects: none
 * @public
 */

import { PRECISION } from "../activity/model";
import {
  DistrustVoteExceedsVerifyVotesError,
  DistrustVoteZeroAmountError,
  InvalidReasonError,
  VerifyVotesZeroError,
} from "./errors";
import type { DistrustInputs } from "./model";

/** Input-shape checks that need no state */
export function assertDistrustVoteShape(amount: bigint, reason: string): void {
  if (amount <= 0n) {
    throw new DistrustVoteZeroAmountError();
  }
  if (reason.trim().length === 0) {
    throw new InvalidReasonError();
  }
}

/**
 * Quota checks against the voter's cumulative distrust for the round.
 * @throws VerifyVotesZeroError | DistrustVoteExceedsVerifyVotesError
 */
export function assertWithinQuota(params: {
  voter: string;
  round: bigint;
  amount: bigint;
  alreadyCast: bigint;
  quota: bigint;
}): void {
  const { voter, round, amount, alreadyCast, quota } = params;
  if (quota <= 0n) {
    throw new VerifyVotesZeroError(voter, round);
  }
  if (alreadyCast + amount > quota) {
    throw new DistrustVoteExceedsVerifyVotesError(
      voter,
      alreadyCast,
      amount,
      quota
    );
  }
}

export function distrustRate(inputs: DistrustInputs): bigint {
  if (!inputs.verified || inputs.totalVotes === 0n) return 0n;
  if (inputs.distrustVotes >= inputs.totalVotes) return PRECISION;
  return (inputs.distrustVotes * PRECISION) / inputs.totalVotes;
}

/**
 * PRECISION - rate, so the pair always sums to PRECISION.
 * When distrustVotes * PRECISION does not divide by totalVotes this is one unit
 * above the floored (totalVotes - distrustVotes) * PRECISION / totalVotes
 * (1 of 3 votes: 666666666666666667, not 666666666666666666).
 */
export function distrustReduction(inputs: DistrustInputs): bigint {
  if (!inputs.verified || inputs.totalVotes === 0n) return PRECISION;
  return PRECISION - distrustRate(inputs);
}
