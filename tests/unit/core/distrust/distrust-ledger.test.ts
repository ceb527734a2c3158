// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/distrust/distrust-ledger`
 * Purpose: Unit tests for cumulative distrust tallies per (activity, round).
 * Scope: Ledger state only; quota enforcement is covered by the distrust feature tests.
 * Side-effects: none
 * Links: src/core/distrust/distrust-ledger.ts
 * @public
 */

import {
  OWNER_A,
  OWNER_B,
  SERVICE_ACTIVITY,
  SIBLING_ACTIVITY,
  VOTER_1,
  VOTER_2,
} from "@tests/_fakes/ids";
import { describe, expect, it } from "vitest";

import { DistrustLedger } from "@/core";

describe("core/distrust/DistrustLedger", () => {
  it("accumulates a pair's amount and keeps the latest reason", () => {
    const ledger = new DistrustLedger();
    ledger.record({
      activity: SERVICE_ACTIVITY,
      round: 2n,
      voter: VOTER_1,
      target: OWNER_A,
      amount: 10n,
      reason: "first",
    });
    const vote = ledger.record({
      activity: SERVICE_ACTIVITY,
      round: 2n,
      voter: VOTER_1,
      target: OWNER_A,
      amount: 20n,
      reason: "second",
    });

    expect(vote).toEqual({
      voter: VOTER_1,
      target: OWNER_A,
      amount: 30n,
      reason: "second",
    });
    expect(
      ledger.votesByVoterByTarget(SERVICE_ACTIVITY, 2n, VOTER_1, OWNER_A)
    ).toEqual(vote);
  });

  it("tracks per-voter and per-target totals separately", () => {
    const ledger = new DistrustLedger();
    const base = { activity: SERVICE_ACTIVITY, round: 2n, reason: "r" };
    ledger.record({ ...base, voter: VOTER_1, target: OWNER_A, amount: 10n });
    ledger.record({ ...base, voter: VOTER_1, target: OWNER_B, amount: 5n });
    ledger.record({ ...base, voter: VOTER_2, target: OWNER_A, amount: 7n });
    ledger.record({ ...base, voter: VOTER_1, target: OWNER_A, amount: 1n });

    expect(ledger.votesByVoter(SERVICE_ACTIVITY, 2n, VOTER_1)).toBe(16n);
    expect(ledger.votesByVoter(SERVICE_ACTIVITY, 2n, VOTER_2)).toBe(7n);
    expect(ledger.totalAgainst(SERVICE_ACTIVITY, 2n, OWNER_A)).toBe(18n);
    expect(ledger.totalAgainst(SERVICE_ACTIVITY, 2n, OWNER_B)).toBe(5n);
    expect(ledger.votersByTargetOf(SERVICE_ACTIVITY, 2n, OWNER_A)).toEqual([
      VOTER_1,
      VOTER_2,
    ]);
  });

  it("isolates rounds and activities", () => {
    const ledger = new DistrustLedger();
    ledger.record({
      activity: SERVICE_ACTIVITY,
      round: 2n,
      voter: VOTER_1,
      target: OWNER_A,
      amount: 10n,
      reason: "r",
    });

    expect(ledger.totalAgainst(SERVICE_ACTIVITY, 3n, OWNER_A)).toBe(0n);
    expect(ledger.totalAgainst(SIBLING_ACTIVITY, 2n, OWNER_A)).toBe(0n);
    expect(ledger.votesByVoter(SIBLING_ACTIVITY, 2n, VOTER_1)).toBe(0n);
    expect(
      ledger.votesByVoterByTarget(SERVICE_ACTIVITY, 3n, VOTER_1, OWNER_A)
    ).toBeUndefined();
  });
});
