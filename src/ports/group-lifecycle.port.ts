// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/group-lifecycle`
 * Purpose: Group lifecycle collaborator: ownership, activation and join constraints.
 * Scope: Defines the read contract the core consumes. Does not contain implementations.
 * Invariants:
 * - A group belongs to exactly one Activity for its whole life.
 * - Queries are synchronous so a command never suspends between its checks and its writes.
 * Side-effects: none (interface definition only)
 * Links: Implemented by adapters, used by features
 * @public
 */

import type { Address } from "viem";

import type { Activity, GroupId, JoinBounds } from "@/core";

export interface GroupLifecyclePort {
  /** Activity the group was created in, null for an unknown group */
  activityOf(groupId: GroupId): Activity | null;
  /** Current owner, null for an unknown group */
  ownerOf(groupId: GroupId): Address | null;
  isGroupActive(groupId: GroupId): boolean;
  joinBounds(groupId: GroupId): JoinBounds;
  /** Active groups of `owner` within `activity` */
  activeGroupIdsByOwner(activity: Activity, owner: Address): readonly GroupId[];
}
