// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/verification/rules`
 * Purpose: Score validation and verified-amount computation with BIGINT arithmetic.
 * Scope: Pure functions. Does not perform I/O or mutate state.
 * Invariants: verifiedAmount truncates once, after summing (stake * score) over all entries.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import { ArrayLengthMismatchError } from "../common/errors";
import { ScoreExceedsMaximumError } from "./errors";
import { MAX_ORIGIN_SCORE, type ScoreEntry } from "./model";

/**
 * Check the shape of a score submission.
 * @throws ArrayLengthMismatchError | ScoreExceedsMaximumError | RangeError (negative score)
 */
export function assertValidScores(
  members: readonly Address[],
  scores: readonly bigint[]
): void {
  if (members.length !== scores.length) {
    throw new ArrayLengthMismatchError(members.length, scores.length);
  }
  members.forEach((account, i) => {
    const score = scores[i] ?? 0n;
    if (score < 0n) {
      throw new RangeError(`Negative score for ${account}: ${score}`);
    }
    if (score > MAX_ORIGIN_SCORE) {
      throw new ScoreExceedsMaximumError(account, score, MAX_ORIGIN_SCORE);
    }
  });
}

/**
 * Collapse a submission to one entry per account; a repeated account keeps its last score.
 * Order follows first appearance.
 */
export function dedupeScores(
  members: readonly Address[],
  scores: readonly bigint[]
): Array<{ account: Address; score: bigint }> {
  const byAccount = new Map<Address, bigint>();
  members.forEach((account, i) => {
    byAccount.set(account, scores[i] ?? 0n);
  });
  return [...byAccount.entries()].map(([account, score]) => ({
    account,
    score,
  }));
}

/** sum(stake * score) / MAX_ORIGIN_SCORE */
export function computeVerifiedAmount(entries: readonly ScoreEntry[]): bigint {
  let weighted = 0n;
  for (const entry of entries) {
    weighted += entry.stake * entry.score;
  }
  return weighted / MAX_ORIGIN_SCORE;
}
