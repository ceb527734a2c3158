// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry and the base fields every event carries.
 * Invariants: All event names registered here; logEvent() enforces base fields (round always).
 * Side-effects: none
 * Links: Used by logEvent(); payload shapes for reward events in ./rewards.
 * @public
 */

export const EVENT_NAMES = {
  // Membership
  GROUP_JOINED: "group.joined",
  GROUP_EXITED: "group.exited",

  // Verification
  VERIFY_DELEGATE_SET: "verify.delegate_set",
  VERIFY_SCORES_SUBMITTED: "verify.scores_submitted",

  // Distrust
  DISTRUST_VOTED: "distrust.voted",

  // Rewards
  REWARD_RECIPIENTS_SET: "reward.recipients_set",
  REWARD_CLAIMED: "reward.claimed",
  REWARD_BURNED: "reward.burned",
  REWARD_BURN_SKIPPED: "reward.burn_skipped",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * round is the decimal string of the round the command wrote to (or settled).
 */
export interface EventBase {
  round: string;
}
