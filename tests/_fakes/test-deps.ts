// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/test-deps`
 * Purpose: Fresh, fully in-memory dependency set for feature service tests.
 * Scope: Builds fake ports, empty core state and a noop logger. Does not touch the container singleton or env.
 * Invariants: Every call returns independent state; ports are the concrete fakes so tests can configure them.
 * Side-effects: none
 * Links: src/adapters/test, src/bootstrap/container.ts
 * @public
 */

import type { Address } from "viem";

import {
  FakeGovernanceVotesAdapter,
  FakeGroupLifecycleAdapter,
  FakeRewardPoolAdapter,
  FakeRoundClock,
  FakeServiceRosterAdapter,
} from "@/adapters/test";
import type { Container } from "@/bootstrap/container";
import {
  type Activity,
  DistrustLedger,
  type GroupId,
  type JoinBounds,
  MembershipIndex,
  RecipientBook,
  RewardLedger,
  VerificationLedger,
} from "@/core";
import { submitOriginScores } from "@/features/verification/public";
import { makeNoopLogger } from "@/shared/observability";
import { SERVICE_ACTIVITY } from "./ids";

export interface TestDeps extends Container {
  groups: FakeGroupLifecycleAdapter;
  roster: FakeServiceRosterAdapter;
  governance: FakeGovernanceVotesAdapter;
  rewardPool: FakeRewardPoolAdapter;
  clock: FakeRoundClock;
}

export interface TestDepsOptions {
  round?: bigint;
  maxRecipients?: number;
  serviceActivity?: Activity;
}

export function makeTestDeps(options: TestDepsOptions = {}): TestDeps {
  return {
    log: makeNoopLogger(),
    config: {
      serviceActivity: options.serviceActivity ?? SERVICE_ACTIVITY,
      maxRecipients: options.maxRecipients ?? 10,
    },
    groups: new FakeGroupLifecycleAdapter(),
    roster: new FakeServiceRosterAdapter(),
    governance: new FakeGovernanceVotesAdapter(),
    rewardPool: new FakeRewardPoolAdapter(),
    clock: new FakeRoundClock(options.round ?? 1n),
    memberships: new MembershipIndex(),
    verifications: new VerificationLedger(),
    distrust: new DistrustLedger(),
    recipients: new RecipientBook(),
    rewardLedger: new RewardLedger(),
  };
}

/** Register an active group and join each member at the current round */
export function seedGroup(
  deps: TestDeps,
  params: {
    groupId: GroupId;
    owner: Address;
    activity?: Activity;
    bounds?: Partial<JoinBounds>;
    members?: ReadonlyArray<readonly [Address, bigint]>;
  }
): void {
  const activity = params.activity ?? SERVICE_ACTIVITY;
  deps.groups.addGroup({
    groupId: params.groupId,
    activity,
    owner: params.owner,
    bounds: params.bounds,
  });
  for (const [account, amount] of params.members ?? []) {
    deps.memberships.join({
      activity,
      groupId: params.groupId,
      account,
      amount,
      round: deps.clock.currentRound(),
    });
  }
}

/** Seed a single-member group and submit the owner's score for it at the current round */
export function verifyGroup(
  deps: TestDeps,
  params: {
    groupId: GroupId;
    owner: Address;
    member: Address;
    stake: bigint;
    score?: bigint;
    activity?: Activity;
  }
): void {
  seedGroup(deps, {
    groupId: params.groupId,
    owner: params.owner,
    activity: params.activity,
    members: [[params.member, params.stake]],
  });
  submitOriginScores(deps, {
    groupId: params.groupId,
    caller: params.owner,
    members: [params.member],
    scores: [params.score ?? 100n],
  });
}
