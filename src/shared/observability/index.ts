// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - events and logging.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * @public
 */

export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type {
  RewardBurnedEvent,
  RewardBurnSkippedEvent,
  RewardClaimedEvent,
} from "./events/rewards";
export type { Logger } from "./logging";
export { logEvent, makeLogger, makeNoopLogger } from "./logging";
