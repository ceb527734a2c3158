// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/distrust/types`
 * Purpose: Dependency and input shapes for distrust services.
 * Scope: Types only.
 * Side-effects: none (types only)
 * @internal
 */

import type { Activity, DistrustLedger, VerificationLedger } from "@/core";
import type { GovernanceVotesPort, GroupLifecyclePort, RoundClock } from "@/ports";
import type { Logger } from "@/shared/observability";

export interface DistrustDeps {
  readonly log: Logger;
  readonly clock: RoundClock;
  readonly groups: GroupLifecyclePort;
  readonly governance: GovernanceVotesPort;
  readonly distrust: DistrustLedger;
}

/** What the rate/reduction reads need */
export interface DistrustReadDeps {
  readonly governance: GovernanceVotesPort;
  readonly verifications: VerificationLedger;
  readonly distrust: DistrustLedger;
}

export interface DistrustVoteInput {
  readonly activity: Activity;
  readonly voter: string;
  /** Group owner the distrust is cast against */
  readonly target: string;
  readonly amount: bigint;
  readonly reason: string;
}
