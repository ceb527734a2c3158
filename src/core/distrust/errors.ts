// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/distrust/errors`
 * Purpose: Domain errors for distrust voting.
 * Scope: Error definitions and type guards. Does not contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class DistrustVoteZeroAmountError extends Error {
  public readonly code = "DISTRUST_VOTE_ZERO_AMOUNT" as const;
  constructor() {
    super("Distrust vote amount must be greater than zero");
    this.name = "DistrustVoteZeroAmountError";
  }
}

export class InvalidReasonError extends Error {
  public readonly code = "INVALID_REASON" as const;
  constructor() {
    super("Distrust vote reason must not be empty");
    this.name = "InvalidReasonError";
  }
}

export class NoActiveGroupsError extends Error {
  public readonly code = "NO_ACTIVE_GROUPS" as const;
  constructor(public readonly owner: string) {
    super(`${owner} owns no active group in this activity`);
    this.name = "NoActiveGroupsError";
  }
}

export class VerifyVotesZeroError extends Error {
  public readonly code = "VERIFY_VOTES_ZERO" as const;
  constructor(
    public readonly voter: string,
    public readonly round: bigint
  ) {
    super(`${voter} has no verify votes in round ${round}`);
    this.name = "VerifyVotesZeroError";
  }
}

export class DistrustVoteExceedsVerifyVotesError extends Error {
  public readonly code = "DISTRUST_VOTE_EXCEEDS_VERIFY_VOTES" as const;
  constructor(
    public readonly voter: string,
    /** Distrust already cast by the voter this round */
    public readonly alreadyCast: bigint,
    public readonly amount: bigint,
    public readonly quota: bigint
  ) {
    super(
      `${voter} cannot cast ${amount}: ${alreadyCast} already cast of ${quota} verify votes`
    );
    this.name = "DistrustVoteExceedsVerifyVotesError";
  }
}

export function isDistrustVoteZeroAmountError(
  error: unknown
): error is DistrustVoteZeroAmountError {
  return error instanceof Error && error.name === "DistrustVoteZeroAmountError";
}

export function isInvalidReasonError(
  error: unknown
): error is InvalidReasonError {
  return error instanceof Error && error.name === "InvalidReasonError";
}

export function isNoActiveGroupsError(
  error: unknown
): error is NoActiveGroupsError {
  return error instanceof Error && error.name === "NoActiveGroupsError";
}

export function isVerifyVotesZeroError(
  error: unknown
): error is VerifyVotesZeroError {
  return error instanceof Error && error.name === "VerifyVotesZeroError";
}

export function isDistrustVoteExceedsVerifyVotesError(
  error: unknown
): error is DistrustVoteExceedsVerifyVotesError {
  return (
    error instanceof Error &&
    error.name === "DistrustVoteExceedsVerifyVotesError"
  );
}
