// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rewards/errors`
 * Purpose: Domain errors for recipient splits and reward claims.
 * Scope: Error definitions and type guards. Does not contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class NotGroupOwnerError extends Error {
  public readonly code = "NOT_GROUP_OWNER" as const;
  constructor(
    public readonly groupId: bigint,
    public readonly caller: string
  ) {
    super(`${caller} is not the owner of group ${groupId}`);
    this.name = "NotGroupOwnerError";
  }
}

export class TooManyRecipientsError extends Error {
  public readonly code = "TOO_MANY_RECIPIENTS" as const;
  constructor(
    public readonly count: number,
    public readonly maxRecipients: number
  ) {
    super(`${count} recipients exceeds the maximum of ${maxRecipients}`);
    this.name = "TooManyRecipientsError";
  }
}

export class ZeroBasisPointsError extends Error {
  public readonly code = "ZERO_BASIS_POINTS" as const;
  constructor(public readonly recipient: string) {
    super(`Share for ${recipient} must be greater than zero`);
    this.name = "ZeroBasisPointsError";
  }
}

export class InvalidBasisPointsError extends Error {
  public readonly code = "INVALID_BASIS_POINTS" as const;
  constructor(
    public readonly total: bigint,
    public readonly precision: bigint
  ) {
    super(`Shares sum to ${total}, above the full unit ${precision}`);
    this.name = "InvalidBasisPointsError";
  }
}

export class RecipientCannotBeSelfError extends Error {
  public readonly code = "RECIPIENT_CANNOT_BE_SELF" as const;
  constructor(public readonly owner: string) {
    super(`Owner ${owner} cannot be listed as a recipient`);
    this.name = "RecipientCannotBeSelfError";
  }
}

export class DuplicateRecipientError extends Error {
  public readonly code = "DUPLICATE_RECIPIENT" as const;
  constructor(public readonly recipient: string) {
    super(`Recipient ${recipient} is listed more than once`);
    this.name = "DuplicateRecipientError";
  }
}

export class AlreadyClaimedError extends Error {
  public readonly code = "ALREADY_CLAIMED" as const;
  constructor(
    public readonly round: bigint,
    public readonly account: string
  ) {
    super(`Reward for round ${round} already claimed by ${account}`);
    this.name = "AlreadyClaimedError";
  }
}

// Type guards

export function isNotGroupOwnerError(
  error: unknown
): error is NotGroupOwnerError {
  return error instanceof Error && error.name === "NotGroupOwnerError";
}

export function isTooManyRecipientsError(
  error: unknown
): error is TooManyRecipientsError {
  return error instanceof Error && error.name === "TooManyRecipientsError";
}

export function isZeroBasisPointsError(
  error: unknown
): error is ZeroBasisPointsError {
  return error instanceof Error && error.name === "ZeroBasisPointsError";
}

export function isInvalidBasisPointsError(
  error: unknown
): error is InvalidBasisPointsError {
  return error instanceof Error && error.name === "InvalidBasisPointsError";
}

export function isRecipientCannotBeSelfError(
  error: unknown
): error is RecipientCannotBeSelfError {
  return error instanceof Error && error.name === "RecipientCannotBeSelfError";
}

export function isDuplicateRecipientError(
  error: unknown
): error is DuplicateRecipientError {
  return error instanceof Error && error.name === "DuplicateRecipientError";
}

export function isAlreadyClaimedError(
  error: unknown
): error is AlreadyClaimedError {
  return error instanceof Error && error.name === "AlreadyClaimedError";
}
