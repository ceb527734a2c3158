// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/verification/services/groupVerify`
 * Purpose: Delegate management and per-round origin score submission.
 * Scope: Authorizes callers, validates submissions, snapshots stake/owner and logs. Does not compute rewards.
 * Invariants:
 * - Only the owner sets the delegate; owner or delegate submit scores.
 * - Scores land in the clock's current round only and replace that round's earlier submission wholesale.
 * - Verified amounts of past rounds read the snapshot, never live membership.
 * Side-effects: IO (logging)
 * @public
 */

import type { Address } from "viem";

import {
  AccountNotInGroupError,
  assertValidScores,
  computeVerifiedAmount,
  dedupeScores,
  type GroupId,
  GroupNotActiveError,
  GroupNotFoundError,
  type GroupVerification,
  NotVerifierError,
  OnlyGroupOwnerError,
  type Round,
  type ScoreEntry,
} from "@/core";
import { EVENT_NAMES, logEvent } from "@/shared/observability";
import { isZeroAccount, toAccount, toAccounts } from "@/shared/web3";
import type {
  SetGroupDelegateInput,
  SubmitOriginScoresInput,
  VerificationDeps,
  VerificationReadDeps,
} from "../types";

/**
 * Replace the group's delegate; the zero address revokes it.
 * @returns false when nothing changed (same delegate, or revoking with none set)
 * @throws GroupNotFoundError | OnlyGroupOwnerError
 */
export function setGroupDelegate(
  deps: Pick<VerificationDeps, "log" | "clock" | "groups" | "verifications">,
  input: SetGroupDelegateInput
): boolean {
  const { groups, verifications, clock, log } = deps;
  const { groupId } = input;
  const caller = toAccount(input.caller);
  const delegate = toAccount(input.delegate);

  const owner = groups.ownerOf(groupId);
  if (!owner) {
    throw new GroupNotFoundError(groupId);
  }
  if (caller !== owner) {
    throw new OnlyGroupOwnerError(groupId, caller);
  }

  const revoked = isZeroAccount(delegate);
  const changed = revoked
    ? verifications.clearDelegate(groupId)
    : verifications.setDelegate(groupId, delegate);

  if (changed) {
    logEvent(log, EVENT_NAMES.VERIFY_DELEGATE_SET, {
      round: clock.currentRound().toString(),
      groupId: groupId.toString(),
      delegate,
      revoked,
    });
  }
  return changed;
}

/**
 * Record origin scores for the current round.
 * A member listed twice keeps its last score.
 * @throws GroupNotFoundError | GroupNotActiveError | NotVerifierError | ArrayLengthMismatchError
 * @throws ScoreExceedsMaximumError | AccountNotInGroupError
 */
export function submitOriginScores(
  deps: VerificationDeps,
  input: SubmitOriginScoresInput
): GroupVerification {
  const { groups, memberships, verifications, clock, log } = deps;
  const { groupId, scores } = input;
  const caller = toAccount(input.caller);

  const activity = groups.activityOf(groupId);
  const owner = groups.ownerOf(groupId);
  if (!activity || !owner) {
    throw new GroupNotFoundError(groupId);
  }
  if (!groups.isGroupActive(groupId)) {
    throw new GroupNotActiveError(groupId);
  }
  if (caller !== owner && caller !== verifications.delegateOf(groupId)) {
    throw new NotVerifierError(groupId, caller);
  }

  const members = toAccounts(input.members);
  assertValidScores(members, scores);

  const entries: ScoreEntry[] = dedupeScores(members, scores).map(
    ({ account, score }) => {
      if (!memberships.isMember(groupId, account)) {
        throw new AccountNotInGroupError(groupId, account);
      }
      return {
        account,
        score,
        stake: memberships.joinedAmountInGroup(groupId, account),
      };
    }
  );

  const round = clock.currentRound();
  const verification: GroupVerification = {
    groupId,
    activity,
    round,
    owner,
    submitter: caller,
    entries,
  };
  verifications.record(verification);

  logEvent(log, EVENT_NAMES.VERIFY_SCORES_SUBMITTED, {
    round: round.toString(),
    groupId: groupId.toString(),
    submitter: caller,
    memberCount: entries.length,
    verifiedAmount: computeVerifiedAmount(entries).toString(),
  });

  return verification;
}

/** sum(stake * score) / MAX_ORIGIN_SCORE over the round's submission; 0 when unverified */
export function verifiedAmount(
  deps: VerificationReadDeps,
  groupId: GroupId,
  round: Round
): bigint {
  const verification = deps.verifications.verificationOf(groupId, round);
  return verification ? computeVerifiedAmount(verification.entries) : 0n;
}

/** Score given to `account` in the round's submission; 0 when not scored */
export function originScore(
  deps: VerificationReadDeps,
  groupId: GroupId,
  round: Round,
  account: string
): bigint {
  const target = toAccount(account);
  const entry = deps.verifications
    .verificationOf(groupId, round)
    ?.entries.find((e) => e.account === target);
  return entry?.score ?? 0n;
}

export function verifiedGroupIds(
  deps: VerificationReadDeps,
  round: Round
): GroupId[] {
  return deps.verifications.verificationsInRound(round).map((v) => v.groupId);
}

/** Groups verified in `round` whose owner at submission time was `owner` */
export function verifiedGroupIdsByOwner(
  deps: VerificationReadDeps,
  round: Round,
  owner: string
): GroupId[] {
  const ownerAccount = toAccount(owner);
  return deps.verifications
    .verificationsByOwner(round, ownerAccount)
    .map((v) => v.groupId);
}

export function delegateOf(
  deps: VerificationReadDeps,
  groupId: GroupId
): Address | undefined {
  return deps.verifications.delegateOf(groupId);
}

export function isVerified(
  deps: VerificationReadDeps,
  groupId: GroupId,
  round: Round
): boolean {
  return deps.verifications.isVerified(groupId, round);
}

export function verificationOf(
  deps: VerificationReadDeps,
  groupId: GroupId,
  round: Round
): GroupVerification | undefined {
  return deps.verifications.verificationOf(groupId, round);
}
