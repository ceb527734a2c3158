// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/distrust/distrust-ledger`
 * Purpose: Cumulative distrust tallies per (activity, round).
 * Scope: In-memory state. Does not validate quotas; callers check before `record`.
 * Invariants: Tallies only grow within a round; per-voter, per-pair and per-target totals move together.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import { type Activity, activityKey, type Round } from "../activity/model";
import type { DistrustVote } from "./model";

const scope = (activity: Activity, round: Round) =>
  `${activityKey(activity)}@${round}`;

export class DistrustLedger {
  private readonly castByVoter = new Map<string, bigint>();
  private readonly againstTarget = new Map<string, bigint>();
  private readonly pairs = new Map<string, DistrustVote>();
  private readonly votersByTarget = new Map<string, Address[]>();

  record(params: {
    activity: Activity;
    round: Round;
    voter: Address;
    target: Address;
    amount: bigint;
    reason: string;
  }): DistrustVote {
    const { activity, round, voter, target, amount, reason } = params;
    const s = scope(activity, round);
    const voterKey = `${s}|${voter}`;
    const targetKey = `${s}|${target}`;
    const pairKey = `${s}|${voter}|${target}`;

    this.castByVoter.set(voterKey, (this.castByVoter.get(voterKey) ?? 0n) + amount);
    this.againstTarget.set(
      targetKey,
      (this.againstTarget.get(targetKey) ?? 0n) + amount
    );

    const previous = this.pairs.get(pairKey);
    if (!previous) {
      const voters = this.votersByTarget.get(targetKey) ?? [];
      voters.push(voter);
      this.votersByTarget.set(targetKey, voters);
    }
    const vote: DistrustVote = {
      voter,
      target,
      amount: (previous?.amount ?? 0n) + amount,
      reason,
    };
    this.pairs.set(pairKey, vote);
    return vote;
  }

  /** Distrust the voter has cast in (activity, round) across all targets */
  votesByVoter(activity: Activity, round: Round, voter: Address): bigint {
    return this.castByVoter.get(`${scope(activity, round)}|${voter}`) ?? 0n;
  }

  votesByVoterByTarget(
    activity: Activity,
    round: Round,
    voter: Address,
    target: Address
  ): DistrustVote | undefined {
    return this.pairs.get(`${scope(activity, round)}|${voter}|${target}`);
  }

  totalAgainst(activity: Activity, round: Round, target: Address): bigint {
    return this.againstTarget.get(`${scope(activity, round)}|${target}`) ?? 0n;
  }

  votersByTargetOf(activity: Activity, round: Round, target: Address): Address[] {
    return [
      ...(this.votersByTarget.get(`${scope(activity, round)}|${target}`) ?? []),
    ];
  }
}
