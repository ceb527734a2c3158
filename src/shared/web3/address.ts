// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/address`
 * Purpose: Account and activity normalization at service boundaries.
 * Scope: Checksum conversion. Does not check balances or chain state.
 * Invariants: Every address used as a map key passes through toAccount (or toActivity for token addresses), so differently-cased inputs compare equal.
 * Side-effects: none
 * @public
 */

import { type Address, getAddress, zeroAddress } from "viem";

import type { Activity } from "@/core";

/**
 * Checksummed form of `raw`.
 * @throws viem InvalidAddressError when `raw` is not a 20-byte hex address
 */
export function toAccount(raw: string): Address {
  return getAddress(raw);
}

export function toAccounts(raws: readonly string[]): Address[] {
  return raws.map(toAccount);
}

/** `activity` with its token address checksummed */
export function toActivity(activity: Activity): Activity {
  return {
    tokenAddress: getAddress(activity.tokenAddress),
    actionId: activity.actionId,
  };
}

export function isZeroAccount(account: Address): boolean {
  return account === zeroAddress;
}
