// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/activity/model`
 * Purpose: Activity identity and the fixed-point unit shared by every ratio in the domain.
 * Scope: Pure types and key helpers. Does not validate or normalise addresses (edges do that).
 * Invariants: All amounts, scores, rounds and group ids are bigint; PRECISION is the single "one full share" unit.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

/** One full share (100%) for distrust rate/reduction and recipient basis points */
export const PRECISION = 10n ** 18n;

export type Round = bigint;
export type GroupId = bigint;

/** Scoped participation category */
export interface Activity {
  readonly tokenAddress: Address;
  readonly actionId: bigint;
}

export function activityKey(activity: Activity): string {
  return `${activity.tokenAddress}:${activity.actionId}`;
}

export function isSameActivity(a: Activity, b: Activity): boolean {
  return a.tokenAddress === b.tokenAddress && a.actionId === b.actionId;
}
