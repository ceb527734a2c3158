// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/verification/errors`
 * Purpose: Domain errors for delegation and score submission.
 * Scope: Error definitions and type guards. Does not contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class OnlyGroupOwnerError extends Error {
  public readonly code = "ONLY_GROUP_OWNER" as const;
  constructor(
    public readonly groupId: bigint,
    public readonly caller: string
  ) {
    super(`Only the owner of group ${groupId} may do this (caller ${caller})`);
    this.name = "OnlyGroupOwnerError";
  }
}

export class NotVerifierError extends Error {
  public readonly code = "NOT_VERIFIER" as const;
  constructor(
    public readonly groupId: bigint,
    public readonly caller: string
  ) {
    super(`${caller} is neither owner nor delegate of group ${groupId}`);
    this.name = "NotVerifierError";
  }
}

export class ScoreExceedsMaximumError extends Error {
  public readonly code = "SCORE_EXCEEDS_MAXIMUM" as const;
  constructor(
    public readonly account: string,
    public readonly score: bigint,
    public readonly maxScore: bigint
  ) {
    super(`Score ${score} for ${account} exceeds maximum ${maxScore}`);
    this.name = "ScoreExceedsMaximumError";
  }
}

export class AccountNotInGroupError extends Error {
  public readonly code = "ACCOUNT_NOT_IN_GROUP" as const;
  constructor(
    public readonly groupId: bigint,
    public readonly account: string
  ) {
    super(`Account ${account} is not a member of group ${groupId}`);
    this.name = "AccountNotInGroupError";
  }
}

export function isOnlyGroupOwnerError(
  error: unknown
): error is OnlyGroupOwnerError {
  return error instanceof Error && error.name === "OnlyGroupOwnerError";
}

export function isNotVerifierError(error: unknown): error is NotVerifierError {
  return error instanceof Error && error.name === "NotVerifierError";
}

export function isScoreExceedsMaximumError(
  error: unknown
): error is ScoreExceedsMaximumError {
  return error instanceof Error && error.name === "ScoreExceedsMaximumError";
}

export function isAccountNotInGroupError(
  error: unknown
): error is AccountNotInGroupError {
  return error instanceof Error && error.name === "AccountNotInGroupError";
}
