// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rounds/round-history`
 * Purpose: Append-only versioned value queried "as of round R".
 * Scope: In-memory sorted arrays with largest-key <= R lookup. Does not know which round is current.
 * Invariants:
 * - Rounds are strictly increasing; a write for the latest round replaces it, a write for an older round is rejected.
 * - Past entries are never mutated.
 * Side-effects: none
 * @public
 */

import type { Round } from "../activity/model";

export class RoundHistory<T> {
  private readonly rounds: Round[] = [];
  private readonly values: T[] = [];

  /**
   * Record `value` for `round`. Same round as the latest entry: last write wins.
   * @throws RangeError when `round` precedes the latest recorded round
   */
  set(round: Round, value: T): void {
    const last = this.rounds.length - 1;
    const lastRound = this.rounds[last];
    if (lastRound === undefined || round > lastRound) {
      this.rounds.push(round);
      this.values.push(value);
      return;
    }
    if (round === lastRound) {
      this.values[last] = value;
      return;
    }
    throw new RangeError(
      `Cannot rewrite round ${round}: history already at round ${lastRound}`
    );
  }

  /** Value in effect at `round`, i.e. the most recent write at or before it */
  valueAt(round: Round): T | undefined {
    let lo = 0;
    let hi = this.rounds.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const midRound = this.rounds[mid];
      if (midRound === undefined) break;
      if (midRound <= round) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found < 0 ? undefined : this.values[found];
  }

  latest(): T | undefined {
    return this.values[this.values.length - 1];
  }

  latestRound(): Round | undefined {
    return this.rounds[this.rounds.length - 1];
  }

  get size(): number {
    return this.rounds.length;
  }
}
