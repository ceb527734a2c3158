// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rewards/rules`
 * Purpose: Recipient validation, reward proportioning, split and burn arithmetic with BIGINT math.
 * Scope: Pure functions. Does not perform I/O or mutate state.
 * Invariants:
 * - ALL_MATH_BIGINT: no floating point anywhere in reward math.
 * - SPLIT_CONSERVATION: sum(amounts) + ownerAmount === reward; truncation lands in ownerAmount.
 * - BURN_CONSERVATION: burnAmount + distributed === pool.
 * Side-effects: none
 * @public
 */

import { type Address, zeroAddress } from "viem";

import { PRECISION } from "../activity/model";
import { ArrayLengthMismatchError, ZeroAddressError } from "../common/errors";
import {
  DuplicateRecipientError,
  InvalidBasisPointsError,
  RecipientCannotBeSelfError,
  TooManyRecipientsError,
  ZeroBasisPointsError,
} from "./errors";
import type { RecipientSplit, SplitResult } from "./model";

/**
 * Validate and build a recipient split.
 * Checks run in a fixed order so the first violation is reported.
 */
export function buildRecipientSplit(params: {
  owner: Address;
  recipients: readonly Address[];
  basisPoints: readonly bigint[];
  maxRecipients: number;
}): RecipientSplit {
  const { owner, recipients, basisPoints, maxRecipients } = params;

  if (recipients.length !== basisPoints.length) {
    throw new ArrayLengthMismatchError(recipients.length, basisPoints.length);
  }
  if (recipients.length > maxRecipients) {
    throw new TooManyRecipientsError(recipients.length, maxRecipients);
  }

  const seen = new Set<Address>();
  let total = 0n;
  const split = recipients.map((recipient, i) => {
    const share = basisPoints[i] ?? 0n;
    if (recipient === zeroAddress) {
      throw new ZeroAddressError(`recipients[${i}]`);
    }
    if (share <= 0n) {
      throw new ZeroBasisPointsError(recipient);
    }
    if (recipient === owner) {
      throw new RecipientCannotBeSelfError(owner);
    }
    if (seen.has(recipient)) {
      throw new DuplicateRecipientError(recipient);
    }
    seen.add(recipient);
    total += share;
    return { recipient, basisPoints: share };
  });

  if (total > PRECISION) {
    throw new InvalidBasisPointsError(total, PRECISION);
  }
  return split;
}

/** Each recipient gets floor(reward * share / PRECISION); the owner keeps the rest */
export function splitReward(reward: bigint, split: RecipientSplit): SplitResult {
  const amounts = split.map((s) => (reward * s.basisPoints) / PRECISION);
  const distributed = amounts.reduce((sum, a) => sum + a, 0n);
  return { amounts, ownerAmount: reward - distributed };
}

/** verifiedAmount scaled by the distrust reduction factor */
export function generatedAmount(
  verifiedAmount: bigint,
  reduction: bigint
): bigint {
  return (verifiedAmount * reduction) / PRECISION;
}

/** pool * generated / totalGenerated, or 0 when nothing was generated */
export function proportionalReward(
  pool: bigint,
  generated: bigint,
  totalGenerated: bigint
): bigint {
  if (totalGenerated === 0n) return 0n;
  return (pool * generated) / totalGenerated;
}

/** Part of the pool no reward absorbed; never negative */
export function burnAmount(pool: bigint, distributed: bigint): bigint {
  if (distributed > pool) {
    throw new RangeError(
      `Distributed reward ${distributed} exceeds pool ${pool}`
    );
  }
  return pool - distributed;
}
