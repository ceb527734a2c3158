// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/rewards/rules`
 * Purpose: Unit tests for recipient split validation, split arithmetic, proportioning and burn.
 * Scope: Pure business logic testing. Does not test external dependencies or I/O.
 * Invariants: ALL_MATH_BIGINT, SPLIT_CONSERVATION, BURN_CONSERVATION.
 * Side-effects: none
 * Links: src/core/rewards/rules.ts
 * @public
 */

import {
  OWNER_A,
  RECIPIENT_1,
  RECIPIENT_2,
  RECIPIENT_3,
  ZERO_ADDRESS,
} from "@tests/_fakes/ids";
import { describe, expect, it } from "vitest";

import {
  ArrayLengthMismatchError,
  buildRecipientSplit,
  burnAmount,
  DuplicateRecipientError,
  generatedAmount,
  InvalidBasisPointsError,
  PRECISION,
  proportionalReward,
  RecipientCannotBeSelfError,
  splitReward,
  TooManyRecipientsError,
  ZeroAddressError,
  ZeroBasisPointsError,
} from "@/core";

const THIRTY_PERCENT = 300_000_000_000_000_000n;
const TWENTY_PERCENT = 200_000_000_000_000_000n;

function build(
  recipients: readonly `0x${string}`[],
  basisPoints: readonly bigint[],
  maxRecipients = 10
) {
  return buildRecipientSplit({
    owner: OWNER_A,
    recipients,
    basisPoints,
    maxRecipients,
  });
}

describe("core/rewards/rules", () => {
  describe("buildRecipientSplit", () => {
    it("builds ordered shares", () => {
      expect(
        build([RECIPIENT_1, RECIPIENT_2], [THIRTY_PERCENT, TWENTY_PERCENT])
      ).toEqual([
        { recipient: RECIPIENT_1, basisPoints: THIRTY_PERCENT },
        { recipient: RECIPIENT_2, basisPoints: TWENTY_PERCENT },
      ]);
    });

    it("accepts an empty split and a split of exactly one full share", () => {
      expect(build([], [])).toEqual([]);
      expect(build([RECIPIENT_1], [PRECISION])).toHaveLength(1);
    });

    it("rejects mismatched lengths", () => {
      expect(() => build([RECIPIENT_1], [])).toThrow(ArrayLengthMismatchError);
    });

    it("rejects more recipients than allowed", () => {
      expect(() =>
        build([RECIPIENT_1, RECIPIENT_2, RECIPIENT_3], [1n, 1n, 1n], 2)
      ).toThrow(TooManyRecipientsError);
    });

    it("rejects the zero address with its position", () => {
      expect(() => build([RECIPIENT_1, ZERO_ADDRESS], [1n, 1n])).toThrow(
        new ZeroAddressError("recipients[1]")
      );
    });

    it("rejects a zero share", () => {
      expect(() => build([RECIPIENT_1], [0n])).toThrow(ZeroBasisPointsError);
    });

    it("rejects the owner as recipient", () => {
      expect(() => build([OWNER_A], [1n])).toThrow(RecipientCannotBeSelfError);
    });

    it("rejects a repeated recipient", () => {
      expect(() => build([RECIPIENT_1, RECIPIENT_1], [1n, 1n])).toThrow(
        DuplicateRecipientError
      );
    });

    it("rejects shares summing above one full share", () => {
      expect(() =>
        build([RECIPIENT_1, RECIPIENT_2], [PRECISION, 1n])
      ).toThrow(InvalidBasisPointsError);
    });

    it("reports the first violation in check order", () => {
      // zero address at index 0 is found before the zero share at index 1
      expect(() => build([ZERO_ADDRESS, RECIPIENT_1], [1n, 0n])).toThrow(
        ZeroAddressError
      );
      // too many recipients is found before any per-entry problem
      expect(() =>
        build([ZERO_ADDRESS, OWNER_A, RECIPIENT_1], [0n, 0n, 0n], 2)
      ).toThrow(TooManyRecipientsError);
    });
  });

  describe("splitReward", () => {
    it("gives the owner the remainder", () => {
      expect(
        splitReward(1000n, [
          { recipient: RECIPIENT_1, basisPoints: THIRTY_PERCENT },
          { recipient: RECIPIENT_2, basisPoints: TWENTY_PERCENT },
        ])
      ).toEqual({ amounts: [300n, 200n], ownerAmount: 500n });
    });

    it("lands truncation dust with the owner", () => {
      const third = 333_333_333_333_333_333n;
      const result = splitReward(10n, [
        { recipient: RECIPIENT_1, basisPoints: third },
        { recipient: RECIPIENT_2, basisPoints: third },
      ]);
      expect(result).toEqual({ amounts: [3n, 3n], ownerAmount: 4n });
    });

    it("conserves the reward for any split", () => {
      const split = [
        { recipient: RECIPIENT_1, basisPoints: 123_456_789_000_000_000n },
        { recipient: RECIPIENT_2, basisPoints: 1n },
        { recipient: RECIPIENT_3, basisPoints: 876_543_210_999_999_999n },
      ];
      for (const reward of [0n, 1n, 7n, 999n, 10n ** 21n + 3n]) {
        const { amounts, ownerAmount } = splitReward(reward, split);
        const total = amounts.reduce((s, a) => s + a, 0n) + ownerAmount;
        expect(total).toBe(reward);
        expect(ownerAmount >= 0n).toBe(true);
      }
    });

    it("gives everything to the owner with an empty split", () => {
      expect(splitReward(77n, [])).toEqual({ amounts: [], ownerAmount: 77n });
    });
  });

  describe("generatedAmount / proportionalReward / burnAmount", () => {
    it("scales verified amount by the reduction", () => {
      expect(generatedAmount(1000n, 750_000_000_000_000_000n)).toBe(750n);
      expect(generatedAmount(1000n, PRECISION)).toBe(1000n);
      expect(generatedAmount(1000n, 0n)).toBe(0n);
    });

    it("proportions the pool and truncates", () => {
      expect(proportionalReward(1000n, 1n, 3n)).toBe(333n);
      expect(proportionalReward(1000n, 5n, 0n)).toBe(0n);
    });

    it("burns what was not distributed", () => {
      expect(burnAmount(1000n, 999n)).toBe(1n);
      expect(burnAmount(1000n, 0n)).toBe(1000n);
      expect(() => burnAmount(10n, 11n)).toThrow(RangeError);
    });
  });
});
