// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rewards/public`
 * Purpose: Public API for reward distribution, recipient splits and burn.
 * Scope: Re-exports only. Does not add logic.
 * Side-effects: none
 * @public
 */

export {
  AlreadyClaimedError,
  DuplicateRecipientError,
  InvalidBasisPointsError,
  isAlreadyClaimedError,
  isDuplicateRecipientError,
  isInvalidBasisPointsError,
  isNotGroupOwnerError,
  isRecipientCannotBeSelfError,
  isTooManyRecipientsError,
  isZeroBasisPointsError,
  NotGroupOwnerError,
  RecipientCannotBeSelfError,
  TooManyRecipientsError,
  ZeroBasisPointsError,
} from "./errors";
export {
  type BurnInfo,
  type BurnRecord,
  type BurnStatus,
  type ClaimStatus,
  DEFAULT_MAX_RECIPIENTS,
  type RecipientShare,
  type RecipientSplit,
  type RewardDistribution,
  type RewardInfo,
  type RewardRecord,
  type SplitResult,
} from "./model";
export { RecipientBook } from "./recipient-book";
export { RewardLedger } from "./reward-ledger";
export {
  buildRecipientSplit,
  burnAmount,
  generatedAmount,
  proportionalReward,
  splitReward,
} from "./rules";
