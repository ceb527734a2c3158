// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and own the in-memory domain state. Does not run commands.
 * Invariants: All ports wired; single container instance per process; core state is created once per container.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to default collaborator ports to the in-process test adapters.
 *        Production has no default adapters: callers pass every collaborator port to createContainer.
 * Links: Feature deps are structural subsets resolved below.
 * @public
 */

import type { Logger } from "pino";

import {
  getTestGovernanceVotes,
  getTestGroupLifecycle,
  getTestRewardPool,
  getTestRoundClock,
  getTestServiceRoster,
} from "@/adapters/test";
import {
  DistrustLedger,
  MembershipIndex,
  RecipientBook,
  RewardLedger,
  VerificationLedger,
} from "@/core";
import type { DistrustDeps } from "@/features/distrust/public";
import type { MembershipDeps } from "@/features/membership/public";
import type {
  RecipientDeps,
  RewardConfig,
  RewardDeps,
} from "@/features/rewards/public";
import type { VerificationDeps } from "@/features/verification/public";
import type {
  GovernanceVotesPort,
  GroupLifecyclePort,
  RewardPoolPort,
  RoundClock,
  ServiceRosterPort,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";
import { toActivity } from "@/shared/web3";

export type ContainerConfig = RewardConfig;

/** External collaborators, consumed through ports */
export interface CollaboratorPorts {
  groups: GroupLifecyclePort;
  roster: ServiceRosterPort;
  governance: GovernanceVotesPort;
  rewardPool: RewardPoolPort;
  clock: RoundClock;
}

export interface Container extends CollaboratorPorts {
  log: Logger;
  config: ContainerConfig;
  memberships: MembershipIndex;
  verifications: VerificationLedger;
  distrust: DistrustLedger;
  recipients: RecipientBook;
  rewardLedger: RewardLedger;
}

export interface CreateContainerOptions {
  ports?: Partial<CollaboratorPorts>;
  config?: Partial<ContainerConfig>;
  log?: Logger;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

export function createContainer(options: CreateContainerOptions = {}): Container {
  const env = serverEnv();
  const log = options.log ?? makeLogger({ component: "container" });

  const config: ContainerConfig = {
    serviceActivity: options.config?.serviceActivity
      ? toActivity(options.config.serviceActivity)
      : { tokenAddress: env.SERVICE_TOKEN_ADDRESS, actionId: env.SERVICE_ACTION_ID },
    maxRecipients: options.config?.maxRecipients ?? env.MAX_RECIPIENTS,
  };

  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      serviceToken: config.serviceActivity.tokenAddress,
      serviceActionId: config.serviceActivity.actionId.toString(),
      maxRecipients: config.maxRecipients,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const ports = options.ports ?? {};
  const resolvePort = <K extends keyof CollaboratorPorts>(
    name: K,
    testDefault: () => CollaboratorPorts[K]
  ): CollaboratorPorts[K] => {
    const port: CollaboratorPorts[K] | undefined = ports[name];
    if (port !== undefined) return port;
    if (env.isTestMode) return testDefault();
    throw new Error(
      `Container: no ${name} port configured (APP_ENV=${env.APP_ENV} has no default adapter)`
    );
  };

  return {
    log,
    config,
    groups: resolvePort("groups", getTestGroupLifecycle),
    roster: resolvePort("roster", getTestServiceRoster),
    governance: resolvePort("governance", getTestGovernanceVotes),
    rewardPool: resolvePort("rewardPool", getTestRewardPool),
    clock: resolvePort("clock", getTestRoundClock),
    memberships: new MembershipIndex(),
    verifications: new VerificationLedger(),
    distrust: new DistrustLedger(),
    recipients: new RecipientBook(),
    rewardLedger: new RewardLedger(),
  };
}

// Feature-specific dependency resolvers

export function resolveMembershipDeps(): MembershipDeps {
  const { log, clock, groups, memberships } = getContainer();
  return { log, clock, groups, memberships };
}

export function resolveVerificationDeps(): VerificationDeps {
  const { log, clock, groups, memberships, verifications } = getContainer();
  return { log, clock, groups, memberships, verifications };
}

export function resolveDistrustDeps(): DistrustDeps {
  const { log, clock, groups, governance, distrust } = getContainer();
  return { log, clock, groups, governance, distrust };
}

export function resolveRecipientDeps(): RecipientDeps {
  const { log, clock, groups, config, recipients } = getContainer();
  return { log, clock, groups, config, recipients };
}

export function resolveRewardDeps(): RewardDeps {
  const c = getContainer();
  return {
    log: c.log,
    clock: c.clock,
    config: c.config,
    groups: c.groups,
    roster: c.roster,
    governance: c.governance,
    rewardPool: c.rewardPool,
    verifications: c.verifications,
    distrust: c.distrust,
    recipients: c.recipients,
    rewardLedger: c.rewardLedger,
  };
}
