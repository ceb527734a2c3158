// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/service-roster`
 * Purpose: Round snapshot of which accounts joined the reward service.
 * Scope: Read-only contract. Does not contain implementations.
 * Invariants: Answers for past rounds never change.
 * Side-effects: none (interface definition only)
 * @public
 */

import type { Address } from "viem";

import type { Round } from "@/core";

export interface ServiceRosterPort {
  /** Joined the service at or before `round` */
  isAccountOnRosterAtRound(account: Address, round: Round): boolean;
  /** Left the service at or before `round` */
  hasExitedByRound(account: Address, round: Round): boolean;
}
