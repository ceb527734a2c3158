// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/verification/verification-ledger`
 * Purpose: Delegate slots and per-round score submissions.
 * Scope: In-memory state and lookups. Does not authorize callers or decide which round is writable.
 * Invariants:
 * - SINGLE_DELEGATE: a group has zero or one delegate; setting one replaces the previous.
 * - SUBMISSION_REPLACES: recording a submission for (group, round) replaces the earlier one wholesale.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import type { GroupId, Round } from "../activity/model";
import type { GroupVerification } from "./model";

export class VerificationLedger {
  private readonly delegates = new Map<GroupId, Address>();
  private readonly byRound = new Map<Round, Map<GroupId, GroupVerification>>();

  delegateOf(groupId: GroupId): Address | undefined {
    return this.delegates.get(groupId);
  }

  /** @returns false when `delegate` was already the delegate */
  setDelegate(groupId: GroupId, delegate: Address): boolean {
    if (this.delegates.get(groupId) === delegate) return false;
    this.delegates.set(groupId, delegate);
    return true;
  }

  /** @returns false when there was no delegate */
  clearDelegate(groupId: GroupId): boolean {
    return this.delegates.delete(groupId);
  }

  record(verification: GroupVerification): void {
    let groups = this.byRound.get(verification.round);
    if (!groups) {
      groups = new Map();
      this.byRound.set(verification.round, groups);
    }
    groups.set(verification.groupId, verification);
  }

  verificationOf(
    groupId: GroupId,
    round: Round
  ): GroupVerification | undefined {
    return this.byRound.get(round)?.get(groupId);
  }

  isVerified(groupId: GroupId, round: Round): boolean {
    return this.verificationOf(groupId, round) !== undefined;
  }

  /** Submissions of a round in first-submission order */
  verificationsInRound(round: Round): GroupVerification[] {
    const groups = this.byRound.get(round);
    return groups ? [...groups.values()] : [];
  }

  verificationsByOwner(round: Round, owner: Address): GroupVerification[] {
    return this.verificationsInRound(round).filter((v) => v.owner === owner);
  }
}
