// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/membership/services/groupJoin`
 * Purpose: Join and exit commands over the membership index, with lifecycle checks from the group port.
 * Scope: Validates, writes the index and logs. Does not move stake (custody is an external collaborator).
 * Invariants:
 * - All checks run before the index is touched; a rejected join or exit leaves every index unchanged.
 * - Joining the group the account is already in tops up the stake; first-join checks (minimum, capacity) apply only once.
 * Side-effects: IO (logging)
 * @public
 */

import type { Address } from "viem";

import {
  type Activity,
  AlreadyInOtherGroupError,
  GroupCapacityExceededError,
  type GroupId,
  GroupNotActiveError,
  GroupNotFoundError,
  InvalidJoinAmountError,
  JoinAmountAboveMaximumError,
  JoinAmountBelowMinimumError,
  type Membership,
  NotJoinedError,
} from "@/core";
import { EVENT_NAMES, logEvent } from "@/shared/observability";
import { toAccount, toActivity } from "@/shared/web3";
import type {
  ExitGroupInput,
  JoinGroupInput,
  MembershipDeps,
  MembershipReadDeps,
} from "../types";

/**
 * Join `groupId` with `amount`, or top up an existing stake in it.
 * @throws GroupNotFoundError | GroupNotActiveError | InvalidJoinAmountError | AlreadyInOtherGroupError
 * @throws JoinAmountBelowMinimumError | GroupCapacityExceededError | JoinAmountAboveMaximumError
 */
export function joinGroup(
  deps: MembershipDeps,
  input: JoinGroupInput
): Membership {
  const { groups, memberships, clock, log } = deps;
  const { groupId, amount } = input;

  const activity = groups.activityOf(groupId);
  if (!activity) {
    throw new GroupNotFoundError(groupId);
  }
  if (!groups.isGroupActive(groupId)) {
    throw new GroupNotActiveError(groupId);
  }
  if (amount <= 0n) {
    throw new InvalidJoinAmountError(amount);
  }

  const account = toAccount(input.account);
  const existing = memberships.membershipOf(activity, account);
  if (existing && existing.groupId !== groupId) {
    throw new AlreadyInOtherGroupError(account, existing.groupId, groupId);
  }

  const bounds = groups.joinBounds(groupId);
  if (!existing) {
    if (amount < bounds.minJoinAmount) {
      throw new JoinAmountBelowMinimumError(
        groupId,
        amount,
        bounds.minJoinAmount
      );
    }
    if (memberships.accountsByGroupIdCount(groupId) >= bounds.maxAccounts) {
      throw new GroupCapacityExceededError(groupId, bounds.maxAccounts);
    }
  }

  const totalAmount = (existing?.amount ?? 0n) + amount;
  if (totalAmount > bounds.maxJoinAmount) {
    throw new JoinAmountAboveMaximumError(
      groupId,
      totalAmount,
      bounds.maxJoinAmount
    );
  }

  const round = clock.currentRound();
  const membership = memberships.join({
    activity,
    groupId,
    account,
    amount,
    round,
  });

  logEvent(log, EVENT_NAMES.GROUP_JOINED, {
    round: round.toString(),
    groupId: groupId.toString(),
    account,
    amount: amount.toString(),
    totalAmount: membership.amount.toString(),
    topUp: existing !== undefined,
  });

  return membership;
}

/**
 * Leave `groupId`, releasing every index entry no other membership still needs.
 * @returns the removed membership (its amount is the stake to release)
 * @throws NotJoinedError when the account is not a member of `groupId`
 */
export function exitGroup(
  deps: MembershipDeps,
  input: ExitGroupInput
): Membership {
  const { groups, memberships, clock, log } = deps;
  const { groupId } = input;
  const account = toAccount(input.account);

  const activity = groups.activityOf(groupId);
  if (!activity || !memberships.isMember(groupId, account)) {
    throw new NotJoinedError(account, groupId);
  }

  const removed = memberships.exit(activity, account);
  if (!removed) {
    throw new NotJoinedError(account, groupId);
  }

  logEvent(log, EVENT_NAMES.GROUP_EXITED, {
    round: clock.currentRound().toString(),
    groupId: groupId.toString(),
    account,
    amount: removed.amount.toString(),
  });

  return removed;
}

/** Stake of `account` in `activity` (0 when not a member) */
export function joinedAmount(
  deps: Pick<MembershipDeps, "memberships">,
  activity: Activity,
  account: string
): bigint {
  return deps.memberships.joinedAmount(
    toActivity(activity),
    toAccount(account)
  );
}

/** Sum of member stakes over the groups of `activity` currently owned by `owner` */
export function totalJoinedAmountByGroupOwner(
  deps: MembershipReadDeps,
  activity: Activity,
  owner: string
): bigint {
  const ownerAccount = toAccount(owner);
  let total = 0n;
  for (const groupId of deps.memberships.groupIdsByActivityOf(
    toActivity(activity)
  )) {
    if (deps.groups.ownerOf(groupId) === ownerAccount) {
      total += deps.memberships.totalJoinedAmountByGroup(groupId);
    }
  }
  return total;
}

/** Member accounts of `groupId` with their stakes */
export function groupMembers(
  deps: Pick<MembershipDeps, "memberships">,
  groupId: GroupId
): Array<{ account: Address; amount: bigint }> {
  return deps.memberships.accountsByGroupId(groupId).map((account) => ({
    account,
    amount: deps.memberships.joinedAmountInGroup(groupId, account),
  }));
}
