// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Test fixtures and in-memory dependency builders.
 * Scope: Re-exports fixtures for testing. Does NOT export real implementations.
 * Invariants: All fakes available via barrel export; no circular dependencies.
 * Side-effects: none
 * Notes: Import fakes from here to replace I/O, time, and RNG in unit tests.
 * Links: tests/setup.ts
 * @public
 */

export { FakeRng } from "./fake-rng";
export * from "./ids";
export {
  makeTestDeps,
  seedGroup,
  type TestDeps,
  type TestDepsOptions,
  verifyGroup,
} from "./test-deps";
