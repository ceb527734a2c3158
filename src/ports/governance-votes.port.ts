// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/governance-votes`
 * Purpose: Governance vote source for distrust quotas and distrust denominators.
 * Scope: Read-only contract. Does not contain implementations.
 * Side-effects: none (interface definition only)
 * @public
 */

import type { Address } from "viem";

import type { Activity, Round } from "@/core";

export interface GovernanceVotesPort {
  /** Verify votes `account` may spend as distrust in (activity, round) */
  verifierQuota(activity: Activity, round: Round, account: Address): bigint;
  /** Total votes the activity received in the round */
  totalVotesForActivity(activity: Activity, round: Round): bigint;
}
