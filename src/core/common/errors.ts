// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/common/errors`
 * Purpose: Domain errors shared by several core modules (input shape and round gating).
 * Scope: Error definitions and type guards. Does not contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class ArrayLengthMismatchError extends Error {
  public readonly code = "ARRAY_LENGTH_MISMATCH" as const;
  constructor(
    public readonly leftLength: number,
    public readonly rightLength: number
  ) {
    super(`Array length mismatch: ${leftLength} vs ${rightLength}`);
    this.name = "ArrayLengthMismatchError";
  }
}

export class ZeroAddressError extends Error {
  public readonly code = "ZERO_ADDRESS" as const;
  constructor(public readonly field: string) {
    super(`${field} must not be the zero address`);
    this.name = "ZeroAddressError";
  }
}

/**
 * Thrown when an operation needs a closed round (claim, burn)
 * but was given the current or a future round.
 */
export class RoundNotFinishedError extends Error {
  public readonly code = "ROUND_NOT_FINISHED" as const;
  constructor(
    public readonly round: bigint,
    public readonly currentRound: bigint
  ) {
    super(`Round ${round} is not finished (current round ${currentRound})`);
    this.name = "RoundNotFinishedError";
  }
}

export function isArrayLengthMismatchError(
  error: unknown
): error is ArrayLengthMismatchError {
  return error instanceof Error && error.name === "ArrayLengthMismatchError";
}

export function isZeroAddressError(error: unknown): error is ZeroAddressError {
  return error instanceof Error && error.name === "ZeroAddressError";
}

export function isRoundNotFinishedError(
  error: unknown
): error is RoundNotFinishedError {
  return error instanceof Error && error.name === "RoundNotFinishedError";
}
