// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/verification/model`
 * Purpose: Round-scoped score submissions.
 * Scope: Pure types and constants. Does not contain business logic or perform I/O.
 * Invariants: A submission snapshots stake and owner so past rounds never depend on later joins, exits or transfers.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import type { Activity, GroupId, Round } from "../activity/model";

/** Upper bound of an origin score (a score of 100 counts the full stake) */
export const MAX_ORIGIN_SCORE = 100n;

export interface ScoreEntry {
  readonly account: Address;
  readonly score: bigint;
  /** Member stake at submission time */
  readonly stake: bigint;
}

/** The single submission in effect for a group in a round */
export interface GroupVerification {
  readonly groupId: GroupId;
  readonly activity: Activity;
  readonly round: Round;
  /** Group owner at submission time; rewards and distrust attach to this account */
  readonly owner: Address;
  /** Owner or delegate that submitted */
  readonly submitter: Address;
  readonly entries: readonly ScoreEntry[];
}
