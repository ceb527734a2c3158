// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rewards/recipient-book`
 * Purpose: Round-versioned recipient splits per (owner, activity, group).
 * Scope: In-memory history. Does not validate splits (rules.buildRecipientSplit does).
 * Invariants: Queries return the split set most recently at or before the round; no entry means an empty split.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import {
  type Activity,
  activityKey,
  type GroupId,
  type Round,
} from "../activity/model";
import { RoundHistory } from "../rounds/round-history";
import type { RecipientSplit } from "./model";

const EMPTY: RecipientSplit = [];

export class RecipientBook {
  private readonly histories = new Map<string, RoundHistory<RecipientSplit>>();

  private key(owner: Address, activity: Activity, groupId: GroupId): string {
    return `${owner}|${activityKey(activity)}|${groupId}`;
  }

  set(
    owner: Address,
    activity: Activity,
    groupId: GroupId,
    round: Round,
    split: RecipientSplit
  ): void {
    const key = this.key(owner, activity, groupId);
    let history = this.histories.get(key);
    if (!history) {
      history = new RoundHistory<RecipientSplit>();
      this.histories.set(key, history);
    }
    history.set(round, split);
  }

  splitAt(
    owner: Address,
    activity: Activity,
    groupId: GroupId,
    round: Round
  ): RecipientSplit {
    return (
      this.histories.get(this.key(owner, activity, groupId))?.valueAt(round) ??
      EMPTY
    );
  }

  latest(owner: Address, activity: Activity, groupId: GroupId): RecipientSplit {
    return this.histories.get(this.key(owner, activity, groupId))?.latest() ?? EMPTY;
  }
}
