// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/membership/public`
 * Purpose: Public API for the membership domain.
 * Scope: Re-exports only. Does not add logic.
 * Side-effects: none
 * @public
 */

export {
  AlreadyInOtherGroupError,
  GroupCapacityExceededError,
  GroupNotActiveError,
  GroupNotFoundError,
  InvalidJoinAmountError,
  isAlreadyInOtherGroupError,
  isGroupCapacityExceededError,
  isGroupNotActiveError,
  isGroupNotFoundError,
  isInvalidJoinAmountError,
  isJoinAmountAboveMaximumError,
  isJoinAmountBelowMinimumError,
  isNotJoinedError,
  JoinAmountAboveMaximumError,
  JoinAmountBelowMinimumError,
  NotJoinedError,
} from "./errors";
export { type JoinParams, MembershipIndex } from "./membership-index";
export type { JoinBounds, Membership } from "./model";
