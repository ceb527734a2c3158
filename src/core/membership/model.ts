// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/membership/model`
 * Purpose: Membership records and join constraints.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import type { Activity, GroupId, Round } from "../activity/model";

/** One account's stake in one group of one Activity */
export interface Membership {
  readonly activity: Activity;
  readonly groupId: GroupId;
  readonly account: Address;
  /** Staked amount (raw token units) */
  readonly amount: bigint;
  /** Round of the first join; top-ups keep it */
  readonly joinedRound: Round;
}

/** Join constraints owned by the group lifecycle collaborator */
export interface JoinBounds {
  readonly minJoinAmount: bigint;
  readonly maxJoinAmount: bigint;
  /** Maximum number of member accounts */
  readonly maxAccounts: number;
}
