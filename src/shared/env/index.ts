// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public entry for validated environment access.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export type { EnvValidationMeta, ServerEnv } from "./server";
export { EnvValidationError, resetServerEnv, serverEnv } from "./server";
