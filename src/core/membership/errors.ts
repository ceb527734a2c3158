// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/membership/errors`
 * Purpose: Domain error classes for group join/exit.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class GroupNotFoundError extends Error {
  public readonly code = "GROUP_NOT_FOUND" as const;
  constructor(public readonly groupId: bigint) {
    super(`Group ${groupId} not found`);
    this.name = "GroupNotFoundError";
  }
}

export class GroupNotActiveError extends Error {
  public readonly code = "GROUP_NOT_ACTIVE" as const;
  constructor(public readonly groupId: bigint) {
    super(`Group ${groupId} is not active`);
    this.name = "GroupNotActiveError";
  }
}

export class InvalidJoinAmountError extends Error {
  public readonly code = "INVALID_JOIN_AMOUNT" as const;
  constructor(public readonly amount: bigint) {
    super(`Join amount must be positive, got ${amount}`);
    this.name = "InvalidJoinAmountError";
  }
}

export class JoinAmountBelowMinimumError extends Error {
  public readonly code = "JOIN_AMOUNT_BELOW_MINIMUM" as const;
  constructor(
    public readonly groupId: bigint,
    public readonly amount: bigint,
    public readonly minJoinAmount: bigint
  ) {
    super(
      `Join amount ${amount} for group ${groupId} is below minimum ${minJoinAmount}`
    );
    this.name = "JoinAmountBelowMinimumError";
  }
}

export class JoinAmountAboveMaximumError extends Error {
  public readonly code = "JOIN_AMOUNT_ABOVE_MAXIMUM" as const;
  constructor(
    public readonly groupId: bigint,
    public readonly totalAmount: bigint,
    public readonly maxJoinAmount: bigint
  ) {
    super(
      `Joined amount ${totalAmount} for group ${groupId} exceeds maximum ${maxJoinAmount}`
    );
    this.name = "JoinAmountAboveMaximumError";
  }
}

export class GroupCapacityExceededError extends Error {
  public readonly code = "GROUP_CAPACITY_EXCEEDED" as const;
  constructor(
    public readonly groupId: bigint,
    public readonly maxAccounts: number
  ) {
    super(`Group ${groupId} is full (${maxAccounts} accounts)`);
    this.name = "GroupCapacityExceededError";
  }
}

export class AlreadyInOtherGroupError extends Error {
  public readonly code = "ALREADY_IN_OTHER_GROUP" as const;
  constructor(
    public readonly account: string,
    public readonly currentGroupId: bigint,
    public readonly requestedGroupId: bigint
  ) {
    super(
      `Account ${account} already belongs to group ${currentGroupId} in this activity (requested ${requestedGroupId})`
    );
    this.name = "AlreadyInOtherGroupError";
  }
}

export class NotJoinedError extends Error {
  public readonly code = "NOT_JOINED" as const;
  constructor(
    public readonly account: string,
    public readonly groupId: bigint
  ) {
    super(`Account ${account} is not a member of group ${groupId}`);
    this.name = "NotJoinedError";
  }
}

// Type guards

export function isGroupNotFoundError(
  error: unknown
): error is GroupNotFoundError {
  return error instanceof Error && error.name === "GroupNotFoundError";
}

export function isGroupNotActiveError(
  error: unknown
): error is GroupNotActiveError {
  return error instanceof Error && error.name === "GroupNotActiveError";
}

export function isInvalidJoinAmountError(
  error: unknown
): error is InvalidJoinAmountError {
  return error instanceof Error && error.name === "InvalidJoinAmountError";
}

export function isJoinAmountBelowMinimumError(
  error: unknown
): error is JoinAmountBelowMinimumError {
  return error instanceof Error && error.name === "JoinAmountBelowMinimumError";
}

export function isJoinAmountAboveMaximumError(
  error: unknown
): error is JoinAmountAboveMaximumError {
  return error instanceof Error && error.name === "JoinAmountAboveMaximumError";
}

export function isGroupCapacityExceededError(
  error: unknown
): error is GroupCapacityExceededError {
  return error instanceof Error && error.name === "GroupCapacityExceededError";
}

export function isAlreadyInOtherGroupError(
  error: unknown
): error is AlreadyInOtherGroupError {
  return error instanceof Error && error.name === "AlreadyInOtherGroupError";
}

export function isNotJoinedError(error: unknown): error is NotJoinedError {
  return error instanceof Error && error.name === "NotJoinedError";
}
