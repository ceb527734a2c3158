// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/rewards/rewardDistribution`
 * Purpose: Unit tests for generated reward, per-verifier shares, recipient splits and claims.
 * Scope: Feature services with in-memory fakes. Burn is covered in rewardBurn.test.ts.
 * Invariants: A claim pays once and fixes the account's reward for the round.
 * Side-effects: none
 * Links: src/features/rewards/services/rewardDistribution.ts, src/features/rewards/services/settlement.ts
 * @public
 */

import {
  FOREIGN_ACTIVITY,
  makeTestDeps,
  MEMBER_1,
  MEMBER_2,
  MEMBER_3,
  MEMBER_4,
  OWNER_A,
  OWNER_B,
  OWNER_C,
  RECIPIENT_1,
  RECIPIENT_2,
  SERVICE_ACTIVITY,
  SIBLING_ACTIVITY,
  STRANGER,
  type TestDeps,
  VOTER_1,
  verifyGroup,
} from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import { AlreadyClaimedError, PRECISION, RoundNotFinishedError } from "@/core";
import { distrustVote } from "@/features/distrust/public";
import {
  claimReward,
  generatedByGroup,
  generatedByVerifier,
  rewardByAccount,
  rewardByRecipient,
  rewardByVerifier,
  rewardDistribution,
  setRecipients,
  totalGeneratedReward,
} from "@/features/rewards/public";

const ROUND = 2n;
const PCT = PRECISION / 100n;

describe("features/rewards/rewardDistribution", () => {
  let deps: TestDeps;

  beforeEach(() => {
    deps = makeTestDeps({ round: ROUND });
    deps.roster.join(OWNER_A, 1n);
  });

  describe("generated reward", () => {
    it("sums verified groups under the service token", () => {
      verifyGroup(deps, { groupId: 1n, owner: OWNER_A, member: MEMBER_1, stake: 40n });
      verifyGroup(deps, {
        groupId: 2n,
        owner: OWNER_A,
        member: MEMBER_2,
        stake: 10n,
        score: 50n,
        activity: SIBLING_ACTIVITY,
      });
      verifyGroup(deps, {
        groupId: 3n,
        owner: OWNER_B,
        member: MEMBER_3,
        stake: 500n,
        activity: FOREIGN_ACTIVITY,
      });

      expect(generatedByGroup(deps, 1n, ROUND)).toBe(40n);
      expect(generatedByGroup(deps, 2n, ROUND)).toBe(5n);
      expect(generatedByGroup(deps, 3n, ROUND)).toBe(0n);
      expect(generatedByVerifier(deps, ROUND, OWNER_A)).toBe(45n);
      expect(generatedByVerifier(deps, ROUND, OWNER_B)).toBe(0n);
      expect(totalGeneratedReward(deps, ROUND)).toBe(45n);
    });

    it("applies the distrust reduction", () => {
      verifyGroup(deps, { groupId: 1n, owner: OWNER_A, member: MEMBER_1, stake: 40n });
      verifyGroup(deps, { groupId: 2n, owner: OWNER_B, member: MEMBER_2, stake: 60n });
      deps.roster.join(OWNER_B, 1n);
      deps.governance.setTotalVotes(SERVICE_ACTIVITY, ROUND, 100n);
      deps.governance.setQuota(SERVICE_ACTIVITY, ROUND, VOTER_1, 100n);
      distrustVote(deps, {
        activity: SERVICE_ACTIVITY,
        voter: VOTER_1,
        target: OWNER_B,
        amount: 50n,
        reason: "inflated scores",
      });
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 70n);

      expect(generatedByGroup(deps, 2n, ROUND)).toBe(30n);
      expect(totalGeneratedReward(deps, ROUND)).toBe(70n);
      expect(rewardByVerifier(deps, ROUND, OWNER_A)).toBe(40n);
      expect(rewardByVerifier(deps, ROUND, OWNER_B)).toBe(30n);
    });
  });

  describe("rewardByVerifier", () => {
    beforeEach(() => {
      verifyGroup(deps, { groupId: 1n, owner: OWNER_A, member: MEMBER_1, stake: 40n });
      verifyGroup(deps, { groupId: 2n, owner: OWNER_B, member: MEMBER_2, stake: 60n });
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
    });

    it("pays an owner on the roster pro rata against all generated reward", () => {
      expect(rewardByVerifier(deps, ROUND, OWNER_A)).toBe(40n);
      expect(rewardByVerifier(deps, ROUND, OWNER_B)).toBe(0n);
    });

    it("pays nothing to an owner who left the roster by the round", () => {
      deps.roster.exit(OWNER_A, ROUND);
      expect(rewardByVerifier(deps, ROUND, OWNER_A)).toBe(0n);
    });

    it("pays nothing to an owner who joined the roster after the round", () => {
      deps.roster.join(OWNER_B, ROUND + 1n);
      expect(rewardByVerifier(deps, ROUND, OWNER_B)).toBe(0n);
    });

    it("splits the pool across several groups of one owner", () => {
      verifyGroup(deps, { groupId: 3n, owner: OWNER_A, member: MEMBER_3, stake: 100n });
      // pool 100 over generated 200: 40 -> 20, 100 -> 50
      expect(rewardByVerifier(deps, ROUND, OWNER_A)).toBe(70n);
    });
  });

  describe("recipient split", () => {
    beforeEach(() => {
      verifyGroup(deps, { groupId: 1n, owner: OWNER_A, member: MEMBER_1, stake: 100n });
      setRecipients(deps, {
        groupId: 1n,
        caller: OWNER_A,
        recipients: [RECIPIENT_1, RECIPIENT_2],
        basisPoints: [30n * PCT, 20n * PCT],
      });
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
    });

    it("gives recipients their shares and the owner the rest", () => {
      expect(rewardDistribution(deps, ROUND, OWNER_A, 1n)).toEqual({
        recipients: [RECIPIENT_1, RECIPIENT_2],
        basisPoints: [30n * PCT, 20n * PCT],
        amounts: [30n, 20n],
        ownerAmount: 50n,
      });
      expect(rewardByRecipient(deps, ROUND, OWNER_A, 1n, RECIPIENT_1)).toBe(30n);
      expect(rewardByRecipient(deps, ROUND, OWNER_A, 1n, OWNER_A)).toBe(50n);
      expect(rewardByRecipient(deps, ROUND, OWNER_A, 1n, STRANGER)).toBe(0n);
      expect(rewardByAccount(deps, ROUND, RECIPIENT_2)).toEqual({
        amount: 20n,
        claimed: false,
      });
    });

    it("lands truncation dust with the owner", () => {
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 9n);
      // reward 109: 32.7 -> 32, 21.8 -> 21
      const distribution = rewardDistribution(deps, ROUND, OWNER_A, 1n);
      expect(distribution.amounts).toEqual([32n, 21n]);
      expect(distribution.ownerAmount).toBe(56n);
    });

    it("uses the split in force at the settled round", () => {
      deps.clock.advance();
      setRecipients(deps, {
        groupId: 1n,
        caller: OWNER_A,
        recipients: [RECIPIENT_1],
        basisPoints: [90n * PCT],
      });
      expect(rewardByRecipient(deps, ROUND, OWNER_A, 1n, RECIPIENT_1)).toBe(30n);
    });

    it("reports a zero split for a group that was not verified", () => {
      expect(rewardDistribution(deps, ROUND + 1n, OWNER_A, 1n)).toEqual({
        recipients: [RECIPIENT_1, RECIPIENT_2],
        basisPoints: [30n * PCT, 20n * PCT],
        amounts: [0n, 0n],
        ownerAmount: 0n,
      });
    });

    it("pays each recipient and the owner on claim", () => {
      deps.clock.advance();

      expect(claimReward(deps, { round: ROUND, account: RECIPIENT_1 })).toEqual({
        amount: 30n,
        claimed: true,
      });
      expect(claimReward(deps, { round: ROUND, account: OWNER_A })).toEqual({
        amount: 50n,
        claimed: true,
      });
      expect(deps.rewardPool.transfers).toEqual([
        { to: RECIPIENT_1, amount: 30n },
        { to: OWNER_A, amount: 50n },
      ]);
      expect(deps.rewardPool.balance).toBe(20n);
    });
  });

  describe("claimReward", () => {
    beforeEach(() => {
      verifyGroup(deps, { groupId: 1n, owner: OWNER_A, member: MEMBER_1, stake: 40n });
      verifyGroup(deps, { groupId: 2n, owner: OWNER_B, member: MEMBER_2, stake: 60n });
    });

    it("reads zero and unclaimed for an account that took no part", () => {
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
      expect(rewardByAccount(deps, ROUND, STRANGER)).toEqual({
        amount: 0n,
        claimed: false,
      });
    });

    it("rejects a round that has not finished", () => {
      expect(() =>
        claimReward(deps, { round: ROUND, account: OWNER_A })
      ).toThrow(RoundNotFinishedError);
    });

    it("pays once and fixes the claimed amount", () => {
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
      deps.clock.advance();

      expect(claimReward(deps, { round: ROUND, account: OWNER_A })).toEqual({
        amount: 40n,
        claimed: true,
      });
      expect(() =>
        claimReward(deps, { round: ROUND, account: OWNER_A })
      ).toThrow(AlreadyClaimedError);

      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
      expect(rewardByAccount(deps, ROUND, OWNER_A)).toEqual({
        amount: 40n,
        claimed: true,
      });
      expect(deps.rewardPool.transfers).toEqual([{ to: OWNER_A, amount: 40n }]);
    });

    it("mints a scheduled pool on first claim", () => {
      deps.rewardPool.scheduleRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
      deps.clock.advance();

      expect(rewardByAccount(deps, ROUND, OWNER_A).amount).toBe(0n);
      expect(claimReward(deps, { round: ROUND, account: OWNER_A }).amount).toBe(40n);
      expect(deps.rewardPool.prepareCalls).toEqual([
        { activity: SERVICE_ACTIVITY, round: ROUND },
      ]);
      expect(deps.rewardPool.balance).toBe(60n);
    });

    it("records a zero claim without a transfer", () => {
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
      deps.clock.advance();

      expect(claimReward(deps, { round: ROUND, account: MEMBER_4 })).toEqual({
        amount: 0n,
        claimed: true,
      });
      expect(deps.rewardPool.transfers).toEqual([]);
      expect(rewardByAccount(deps, ROUND, MEMBER_4)).toEqual({
        amount: 0n,
        claimed: true,
      });
    });

    it("keeps rounds independent", () => {
      deps.rewardPool.mintRoundReward(SERVICE_ACTIVITY, ROUND, 100n);
      deps.clock.advance();
      verifyGroup(deps, { groupId: 4n, owner: OWNER_C, member: MEMBER_4, stake: 1n });
      deps.clock.advance();

      claimReward(deps, { round: ROUND, account: OWNER_A });
      expect(rewardByAccount(deps, ROUND + 1n, OWNER_A)).toEqual({
        amount: 0n,
        claimed: false,
      });
    });
  });
});
