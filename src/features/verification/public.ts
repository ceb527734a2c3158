// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/verification/public`
 * Purpose: Public API surface for group verification and delegation.
 * Scope: Re-exports public types and functions; does not implement logic.
 * Side-effects: none
 * @public
 */

export {
  delegateOf,
  isVerified,
  originScore,
  setGroupDelegate,
  submitOriginScores,
  verifiedAmount,
  verifiedGroupIds,
  verifiedGroupIdsByOwner,
  verificationOf,
} from "./services/groupVerify";
export type {
  SetGroupDelegateInput,
  SubmitOriginScoresInput,
  VerificationDeps,
  VerificationReadDeps,
} from "./types";
