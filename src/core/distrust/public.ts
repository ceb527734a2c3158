// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/distrust/public`
 * Purpose: Public API for distrust voting.
 * Scope: Re-exports only. Does not add logic.
 * Side-effects: none
 * @public
 */

export { DistrustLedger } from "./distrust-ledger";
export {
  DistrustVoteExceedsVerifyVotesError,
  DistrustVoteZeroAmountError,
  InvalidReasonError,
  isDistrustVoteExceedsVerifyVotesError,
  isDistrustVoteZeroAmountError,
  isInvalidReasonError,
  isNoActiveGroupsError,
  isVerifyVotesZeroError,
  NoActiveGroupsError,
  VerifyVotesZeroError,
} from "./errors";
export type { DistrustInputs, DistrustVote } from "./model";
export {
  assertDistrustVoteShape,
  assertWithinQuota,
  distrustRate,
  distrustReduction,
} from "./rules";
