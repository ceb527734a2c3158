// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/distrust/model`
 * Purpose: Distrust vote records and the inputs of the rate/reduction formulas.
 * Scope: Pure types. Does not contain business logic.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

/** Cumulative vote of one voter against one owner in one (activity, round) */
export interface DistrustVote {
  readonly voter: Address;
  readonly target: Address;
  readonly amount: bigint;
  /** Reason of the most recent call */
  readonly reason: string;
}

export interface DistrustInputs {
  /** Whether the group was verified in the round */
  readonly verified: boolean;
  /** Cumulative distrust cast against the group owner in the round */
  readonly distrustVotes: bigint;
  /** Total governance votes for the group's activity in the round */
  readonly totalVotes: bigint;
}
