// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/membership/membership-index`
 * Purpose: Multi-dimensional reverse index between accounts, groups, tokens and activities.
 * Scope: In-memory index state and queries. Does not check lifecycle rules (active, bounds, capacity); feature services do.
 * Invariants:
 * - ONE_GROUP_PER_ACTIVITY: an account holds at most one membership per Activity.
 * - NO_STALE_ENTRIES: after exit, an account stays in an index iff another membership still populates that key.
 * - Parent keys are removed only when their child set becomes empty; counts are set cardinalities.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import { type Activity, activityKey, type GroupId } from "../activity/model";
import { AlreadyInOtherGroupError } from "./errors";
import type { Membership } from "./model";
import { SetIndex } from "./set-index";

const ALL = "*";

const memberKey = (groupId: GroupId, account: Address) =>
  `${groupId}:${account}`;
const accountActivityKey = (activity: Activity, account: Address) =>
  `${activityKey(activity)}:${account}`;
const accountTokenKey = (account: Address, tokenAddress: Address) =>
  `${account}:${tokenAddress}`;

export interface JoinParams {
  readonly activity: Activity;
  readonly groupId: GroupId;
  readonly account: Address;
  readonly amount: bigint;
  readonly round: bigint;
}

export class MembershipIndex {
  private readonly memberships = new Map<string, Membership>();
  private readonly groupIdByAccountActivity = new Map<string, GroupId>();

  private readonly accountsByGroup = new SetIndex<Address>();
  private readonly groupIdsByActivity = new SetIndex<GroupId>();
  private readonly actionIdsByToken = new SetIndex<bigint>();
  private readonly tokens = new SetIndex<Address>();
  private readonly accountsByActivity = new SetIndex<Address>();
  private readonly accountsByToken = new SetIndex<Address>();
  private readonly groupIdsByAccount = new SetIndex<GroupId>();
  private readonly tokensByAccount = new SetIndex<Address>();
  private readonly actionIdsByAccountToken = new SetIndex<bigint>();

  /**
   * Insert a membership, or add `amount` to the stake when the account is already in `groupId`.
   * @returns the membership after the join
   * @throws AlreadyInOtherGroupError when the account is in another group of the same Activity
   */
  join(params: JoinParams): Membership {
    const { activity, groupId, account, amount, round } = params;
    const existing = this.membershipOf(activity, account);

    if (existing) {
      if (existing.groupId !== groupId) {
        throw new AlreadyInOtherGroupError(account, existing.groupId, groupId);
      }
      const toppedUp: Membership = {
        ...existing,
        amount: existing.amount + amount,
      };
      this.memberships.set(memberKey(groupId, account), toppedUp);
      return toppedUp;
    }

    const membership: Membership = {
      activity,
      groupId,
      account,
      amount,
      joinedRound: round,
    };
    const ak = activityKey(activity);
    const token = activity.tokenAddress;

    this.memberships.set(memberKey(groupId, account), membership);
    this.groupIdByAccountActivity.set(
      accountActivityKey(activity, account),
      groupId
    );

    this.accountsByGroup.add(String(groupId), account);
    this.groupIdsByActivity.add(ak, groupId);
    this.actionIdsByToken.add(token, activity.actionId);
    this.tokens.add(ALL, token);
    this.accountsByActivity.add(ak, account);
    this.accountsByToken.add(token, account);
    this.groupIdsByAccount.add(account, groupId);
    this.tokensByAccount.add(account, token);
    this.actionIdsByAccountToken.add(
      accountTokenKey(account, token),
      activity.actionId
    );

    return membership;
  }

  /**
   * Remove the account's membership in `activity`.
   * @returns the removed membership, or undefined when there was none
   */
  exit(activity: Activity, account: Address): Membership | undefined {
    const membership = this.membershipOf(activity, account);
    if (!membership) return undefined;

    const { groupId } = membership;
    const ak = activityKey(activity);
    const token = activity.tokenAddress;

    this.memberships.delete(memberKey(groupId, account));
    this.groupIdByAccountActivity.delete(accountActivityKey(activity, account));

    // group -> activity -> token chain: each level drops only when the level below empties
    if (this.accountsByGroup.remove(String(groupId), account)) {
      if (this.groupIdsByActivity.remove(ak, groupId)) {
        if (this.actionIdsByToken.remove(token, activity.actionId)) {
          this.tokens.remove(ALL, token);
        }
      }
    }

    this.accountsByActivity.remove(ak, account);
    this.groupIdsByAccount.remove(account, groupId);

    // account keeps its token-level entries while another action under the token remains
    if (
      this.actionIdsByAccountToken.remove(
        accountTokenKey(account, token),
        activity.actionId
      )
    ) {
      this.accountsByToken.remove(token, account);
      this.tokensByAccount.remove(account, token);
    }

    return membership;
  }

  membershipOf(activity: Activity, account: Address): Membership | undefined {
    const groupId = this.groupIdByAccountActivity.get(
      accountActivityKey(activity, account)
    );
    if (groupId === undefined) return undefined;
    return this.memberships.get(memberKey(groupId, account));
  }

  isMember(groupId: GroupId, account: Address): boolean {
    return this.accountsByGroup.has(String(groupId), account);
  }

  /** Stake of `account` in `groupId`, 0 when not a member */
  joinedAmountInGroup(groupId: GroupId, account: Address): bigint {
    return this.memberships.get(memberKey(groupId, account))?.amount ?? 0n;
  }

  joinedAmount(activity: Activity, account: Address): bigint {
    return this.membershipOf(activity, account)?.amount ?? 0n;
  }

  totalJoinedAmountByGroup(groupId: GroupId): bigint {
    let total = 0n;
    for (const account of this.accountsByGroup.values(String(groupId))) {
      total += this.joinedAmountInGroup(groupId, account);
    }
    return total;
  }

  // -- by group --

  accountsByGroupId(groupId: GroupId): Address[] {
    return this.accountsByGroup.values(String(groupId));
  }

  accountsByGroupIdCount(groupId: GroupId): number {
    return this.accountsByGroup.count(String(groupId));
  }

  // -- by activity --

  groupIdsByActivityOf(activity: Activity): GroupId[] {
    return this.groupIdsByActivity.values(activityKey(activity));
  }

  groupIdsByActivityCount(activity: Activity): number {
    return this.groupIdsByActivity.count(activityKey(activity));
  }

  accountsByActivityOf(activity: Activity): Address[] {
    return this.accountsByActivity.values(activityKey(activity));
  }

  accountsByActivityCount(activity: Activity): number {
    return this.accountsByActivity.count(activityKey(activity));
  }

  // -- by token --

  tokenAddresses(): Address[] {
    return this.tokens.values(ALL);
  }

  tokenAddressesCount(): number {
    return this.tokens.count(ALL);
  }

  actionIdsByTokenAddress(tokenAddress: Address): bigint[] {
    return this.actionIdsByToken.values(tokenAddress);
  }

  actionIdsByTokenAddressCount(tokenAddress: Address): number {
    return this.actionIdsByToken.count(tokenAddress);
  }

  accountsByTokenAddress(tokenAddress: Address): Address[] {
    return this.accountsByToken.values(tokenAddress);
  }

  accountsByTokenAddressCount(tokenAddress: Address): number {
    return this.accountsByToken.count(tokenAddress);
  }

  // -- by account --

  groupIdsByAccountOf(account: Address): GroupId[] {
    return this.groupIdsByAccount.values(account);
  }

  groupIdsByAccountCount(account: Address): number {
    return this.groupIdsByAccount.count(account);
  }

  tokenAddressesByAccount(account: Address): Address[] {
    return this.tokensByAccount.values(account);
  }

  tokenAddressesByAccountCount(account: Address): number {
    return this.tokensByAccount.count(account);
  }

  actionIdsByAccountAndToken(account: Address, tokenAddress: Address): bigint[] {
    return this.actionIdsByAccountToken.values(
      accountTokenKey(account, tokenAddress)
    );
  }

  actionIdsByAccountAndTokenCount(
    account: Address,
    tokenAddress: Address
  ): number {
    return this.actionIdsByAccountToken.count(
      accountTokenKey(account, tokenAddress)
    );
  }
}
