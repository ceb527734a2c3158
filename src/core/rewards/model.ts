// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rewards/model`
 * Purpose: Recipient splits, reward and burn records.
 * Scope: Pure types and status unions. Does not contain business logic.
 * Invariants: Claim and burn state are explicit statuses; the ledger hands out "unclaimed"/"unburned" records, never undefined.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

/** Default cap on recipients per split (overridable by MAX_RECIPIENTS) */
export const DEFAULT_MAX_RECIPIENTS = 10;

export type ClaimStatus = "unclaimed" | "claimed";

export type BurnStatus = "unburned" | "burned";

export interface RecipientShare {
  readonly recipient: Address;
  /** Share in PRECISION units (10^18 == 100%) */
  readonly basisPoints: bigint;
}

/** Ordered recipient shares; the owner keeps PRECISION - sum(basisPoints) */
export type RecipientSplit = readonly RecipientShare[];

export interface RewardRecord {
  readonly amount: bigint;
  readonly status: ClaimStatus;
}

export interface BurnRecord {
  readonly amount: bigint;
  readonly status: BurnStatus;
}

/** Result of splitting one group's reward */
export interface SplitResult {
  readonly amounts: readonly bigint[];
  readonly ownerAmount: bigint;
}

export interface RewardDistribution {
  readonly recipients: readonly Address[];
  readonly basisPoints: readonly bigint[];
  readonly amounts: readonly bigint[];
  readonly ownerAmount: bigint;
}

export interface RewardInfo {
  readonly amount: bigint;
  readonly claimed: boolean;
}

export interface BurnInfo {
  readonly amount: bigint;
  readonly burned: boolean;
}
