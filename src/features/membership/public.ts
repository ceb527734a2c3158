// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/membership/public`
 * Purpose: Public API surface for group membership - barrel export for stable feature boundaries.
 * Scope: Re-exports public types and functions; does not implement logic.
 * Side-effects: none
 * Notes: Feature consumers should only import from this file, never from internal modules.
 * @public
 */

export {
  exitGroup,
  groupMembers,
  joinedAmount,
  joinGroup,
  totalJoinedAmountByGroupOwner,
} from "./services/groupJoin";
export type {
  ExitGroupInput,
  JoinGroupInput,
  MembershipDeps,
  MembershipReadDeps,
} from "./types";
