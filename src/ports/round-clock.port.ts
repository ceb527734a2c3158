// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/round-clock`
 * Purpose: Round abstraction for deterministic testing.
 * Scope: Provides the current round. Does not advance rounds.
 * Invariants: Never decreases.
 * Side-effects: none
 * Links: Implemented by adapters, used by features
 * @public
 */

export interface RoundClock {
  currentRound(): bigint;
}
