// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/verification/types`
 * Purpose: Dependency and input shapes for verification services.
 * Scope: Types only.
 * Side-effects: none (types only)
 * @internal
 */

import type { GroupId, MembershipIndex, VerificationLedger } from "@/core";
import type { GroupLifecyclePort, RoundClock } from "@/ports";
import type { Logger } from "@/shared/observability";

export interface VerificationDeps {
  readonly log: Logger;
  readonly clock: RoundClock;
  readonly groups: GroupLifecyclePort;
  readonly memberships: MembershipIndex;
  readonly verifications: VerificationLedger;
}

export type VerificationReadDeps = Pick<VerificationDeps, "verifications">;

export interface SetGroupDelegateInput {
  readonly groupId: GroupId;
  readonly caller: string;
  /** New delegate; the zero address revokes */
  readonly delegate: string;
}

export interface SubmitOriginScoresInput {
  readonly groupId: GroupId;
  readonly caller: string;
  readonly members: readonly string[];
  readonly scores: readonly bigint[];
}
