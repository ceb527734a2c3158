// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/membership/types`
 * Purpose: Dependency and input shapes for membership services.
 * Scope: Types only. Structural subsets of the container so tests can pass plain objects.
 * Side-effects: none (types only)
 * @internal
 */

import type { GroupId, MembershipIndex } from "@/core";
import type { GroupLifecyclePort, RoundClock } from "@/ports";
import type { Logger } from "@/shared/observability";

export interface MembershipDeps {
  readonly log: Logger;
  readonly clock: RoundClock;
  readonly groups: GroupLifecyclePort;
  readonly memberships: MembershipIndex;
}

export type MembershipReadDeps = Pick<MembershipDeps, "groups" | "memberships">;

export interface JoinGroupInput {
  readonly groupId: GroupId;
  /** Joining account (the caller) */
  readonly account: string;
  readonly amount: bigint;
}

export interface ExitGroupInput {
  readonly groupId: GroupId;
  readonly account: string;
}
