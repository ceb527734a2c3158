// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events/rewards`
 * Purpose: Strict payload shapes for reward settlement events.
 * Scope: Type definitions only. Amounts are decimal strings.
 * Side-effects: none
 * @public
 */

import type { EventBase } from "./index";

export interface RewardClaimedEvent extends EventBase {
  account: string;
  amount: string;
}

export interface RewardBurnedEvent extends EventBase {
  amount: string;
  pool: string;
}

export interface RewardBurnSkippedEvent extends EventBase {
  reason: "already_burned" | "nothing_to_burn";
}
