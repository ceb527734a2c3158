// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/distrust/public`
 * Purpose: Public API surface for distrust voting.
 * Scope: Re-exports public types and functions; does not implement logic.
 * Side-effects: none
 * @public
 */

export {
  distrustInputsOf,
  distrustRateByGroup,
  distrustReductionByGroup,
  distrustVote,
  distrustVotersByTarget,
  distrustVotesByVoter,
  distrustVotesByVoterByTarget,
  totalDistrustVotes,
} from "./services/groupDistrust";
export type { DistrustDeps, DistrustReadDeps, DistrustVoteInput } from "./types";
