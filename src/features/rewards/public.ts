// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/public`
 * Purpose: Public API surface for reward splits, distribution, claim and burn.
 * Scope: Re-exports public types and functions; does not implement logic.
 * Side-effects: none
 * Notes: settlement internals are exposed read-only for diagnostics and tests.
 * @public
 */

export {
  recipientsAt,
  recipientsLatest,
  setRecipients,
} from "./services/recipients";
export { burnInfo, burnRewardIfNeeded } from "./services/rewardBurn";
export {
  claimReward,
  generatedByGroup,
  generatedByVerifier,
  rewardByAccount,
  rewardByRecipient,
  rewardByVerifier,
  rewardDistribution,
  totalGeneratedReward,
} from "./services/rewardDistribution";
export { isOwnerEligible, settleRound } from "./services/settlement";
export type {
  ClaimRewardInput,
  GroupSettlement,
  RecipientDeps,
  RewardConfig,
  RewardDeps,
  RewardReadDeps,
  RoundSettlement,
  SetRecipientsInput,
} from "./types";
