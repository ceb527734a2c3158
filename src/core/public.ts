// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by features, ports and adapters via \@/core alias
 * @public
 */

export {
  type Activity,
  activityKey,
  type GroupId,
  isSameActivity,
  PRECISION,
  type Round,
} from "./activity/model";
export {
  ArrayLengthMismatchError,
  isArrayLengthMismatchError,
  isRoundNotFinishedError,
  isZeroAddressError,
  RoundNotFinishedError,
  ZeroAddressError,
} from "./common/errors";
export {
  assertDistrustVoteShape,
  assertWithinQuota,
  type DistrustInputs,
  DistrustLedger,
  type DistrustVote,
  DistrustVoteExceedsVerifyVotesError,
  DistrustVoteZeroAmountError,
  distrustRate,
  distrustReduction,
  InvalidReasonError,
  isDistrustVoteExceedsVerifyVotesError,
  isDistrustVoteZeroAmountError,
  isInvalidReasonError,
  isNoActiveGroupsError,
  isVerifyVotesZeroError,
  NoActiveGroupsError,
  VerifyVotesZeroError,
} from "./distrust/public";
export {
  AlreadyInOtherGroupError,
  GroupCapacityExceededError,
  GroupNotActiveError,
  GroupNotFoundError,
  InvalidJoinAmountError,
  isAlreadyInOtherGroupError,
  isGroupCapacityExceededError,
  isGroupNotActiveError,
  isGroupNotFoundError,
  isInvalidJoinAmountError,
  isJoinAmountAboveMaximumError,
  isJoinAmountBelowMinimumError,
  isNotJoinedError,
  type JoinBounds,
  JoinAmountAboveMaximumError,
  JoinAmountBelowMinimumError,
  type JoinParams,
  type Membership,
  MembershipIndex,
  NotJoinedError,
} from "./membership/public";
export {
  AlreadyClaimedError,
  type BurnInfo,
  type BurnRecord,
  type BurnStatus,
  buildRecipientSplit,
  burnAmount,
  type ClaimStatus,
  DEFAULT_MAX_RECIPIENTS,
  DuplicateRecipientError,
  generatedAmount,
  InvalidBasisPointsError,
  isAlreadyClaimedError,
  isDuplicateRecipientError,
  isInvalidBasisPointsError,
  isNotGroupOwnerError,
  isRecipientCannotBeSelfError,
  isTooManyRecipientsError,
  isZeroBasisPointsError,
  NotGroupOwnerError,
  proportionalReward,
  RecipientBook,
  RecipientCannotBeSelfError,
  type RecipientShare,
  type RecipientSplit,
  type RewardDistribution,
  type RewardInfo,
  RewardLedger,
  type RewardRecord,
  type SplitResult,
  splitReward,
  TooManyRecipientsError,
  ZeroBasisPointsError,
} from "./rewards/public";
export { RoundHistory } from "./rounds/round-history";
export {
  AccountNotInGroupError,
  assertValidScores,
  computeVerifiedAmount,
  dedupeScores,
  type GroupVerification,
  isAccountNotInGroupError,
  isNotVerifierError,
  isOnlyGroupOwnerError,
  isScoreExceedsMaximumError,
  MAX_ORIGIN_SCORE,
  NotVerifierError,
  OnlyGroupOwnerError,
  type ScoreEntry,
  ScoreExceedsMaximumError,
  VerificationLedger,
} from "./verification/public";
