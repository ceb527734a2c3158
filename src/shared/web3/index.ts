// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3`
 * Purpose: Web3 helpers barrel.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { isZeroAccount, toAccount, toAccounts, toActivity } from "./address";
