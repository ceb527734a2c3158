// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/verification/public`
 * Purpose: Public API for delegation and score submission.
 * Scope: Re-exports only. Does not add logic.
 * Side-effects: none
 * @public
 */

export {
  AccountNotInGroupError,
  isAccountNotInGroupError,
  isNotVerifierError,
  isOnlyGroupOwnerError,
  isScoreExceedsMaximumError,
  NotVerifierError,
  OnlyGroupOwnerError,
  ScoreExceedsMaximumError,
} from "./errors";
export {
  type GroupVerification,
  MAX_ORIGIN_SCORE,
  type ScoreEntry,
} from "./model";
export {
  assertValidScores,
  computeVerifiedAmount,
  dedupeScores,
} from "./rules";
export { VerificationLedger } from "./verification-ledger";
