// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logEvent`
 * Purpose: Type-safe event logger that enforces event name registry and base fields.
 * Scope: Single function for logging structured domain events. Does not create loggers.
 * Invariants: round MUST be present (throws under Vitest, logs error elsewhere); event name MUST be from registry.
 * Side-effects: IO (logging)
 * Links: Uses EVENT_NAMES registry from events/index.ts; called by feature services.
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "../events";

/**
 * @param fields - Event-specific fields; bigint values must already be strings (pino cannot serialize bigint)
 * @param message - Human-readable message (defaults to event name)
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message?: string
): void {
  if (!fields.round) {
    const isStrict =
      typeof process !== "undefined" && process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without round`
      );
    }
    logger.error(
      { event: eventName, missingField: "round" },
      "inv_missing_round_in_logEvent"
    );
    return;
  }

  logger.info({ event: eventName, ...fields }, message ?? eventName);
}
