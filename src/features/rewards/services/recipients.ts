// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/services/recipients`
 * Purpose: Owner-managed recipient splits, versioned by round.
 * Scope: Authorizes the owner, validates the split and writes it for the current round. Does not move funds.
 * Invariants: Last write in a round wins; an empty list clears the split from that round on.
 * Side-effects: IO (logging)
 * @public
 */

import {
  buildRecipientSplit,
  type GroupId,
  GroupNotFoundError,
  NotGroupOwnerError,
  type RecipientSplit,
  type Round,
} from "@/core";
import { EVENT_NAMES, logEvent } from "@/shared/observability";
import { toAccount, toAccounts } from "@/shared/web3";
import type { RecipientDeps, SetRecipientsInput } from "../types";

/**
 * @throws GroupNotFoundError | NotGroupOwnerError | ArrayLengthMismatchError | TooManyRecipientsError
 * @throws ZeroAddressError | ZeroBasisPointsError | RecipientCannotBeSelfError | DuplicateRecipientError
 * @throws InvalidBasisPointsError
 */
export function setRecipients(
  deps: RecipientDeps,
  input: SetRecipientsInput
): RecipientSplit {
  const { groups, recipients, config, clock, log } = deps;
  const { groupId } = input;
  const caller = toAccount(input.caller);

  const activity = groups.activityOf(groupId);
  const owner = groups.ownerOf(groupId);
  if (!activity || !owner) {
    throw new GroupNotFoundError(groupId);
  }
  if (caller !== owner) {
    throw new NotGroupOwnerError(groupId, caller);
  }

  const split = buildRecipientSplit({
    owner,
    recipients: toAccounts(input.recipients),
    basisPoints: input.basisPoints,
    maxRecipients: config.maxRecipients,
  });

  const round = clock.currentRound();
  recipients.set(owner, activity, groupId, round, split);

  logEvent(log, EVENT_NAMES.REWARD_RECIPIENTS_SET, {
    round: round.toString(),
    groupId: groupId.toString(),
    owner,
    recipientCount: split.length,
  });

  return split;
}

/** Split in effect for (owner, group) at `round`: the latest one set at or before it */
export function recipientsAt(
  deps: Pick<RecipientDeps, "groups" | "recipients">,
  owner: string,
  groupId: GroupId,
  round: Round
): RecipientSplit {
  const activity = deps.groups.activityOf(groupId);
  if (!activity) return [];
  return deps.recipients.splitAt(toAccount(owner), activity, groupId, round);
}

export function recipientsLatest(
  deps: Pick<RecipientDeps, "groups" | "recipients">,
  owner: string,
  groupId: GroupId
): RecipientSplit {
  const activity = deps.groups.activityOf(groupId);
  if (!activity) return [];
  return deps.recipients.latest(toAccount(owner), activity, groupId);
}
