// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/types`
 * Purpose: Dependency, config and input shapes for reward services.
 * Scope: Types only.
 * Side-effects: none (types only)
 * @internal
 */

import type {
  Activity,
  GroupId,
  GroupVerification,
  RecipientBook,
  RecipientSplit,
  RewardLedger,
  Round,
  SplitResult,
} from "@/core";
import type { DistrustReadDeps } from "@/features/distrust/public";
import type {
  GroupLifecyclePort,
  RewardPoolPort,
  RoundClock,
  ServiceRosterPort,
} from "@/ports";
import type { Logger } from "@/shared/observability";

export interface RewardConfig {
  /** Activity whose pool pays rewards; every verified group under its token is in scope */
  readonly serviceActivity: Activity;
  readonly maxRecipients: number;
}

export interface RecipientDeps {
  readonly log: Logger;
  readonly clock: RoundClock;
  readonly groups: GroupLifecyclePort;
  readonly config: Pick<RewardConfig, "maxRecipients">;
  readonly recipients: RecipientBook;
}

export interface RewardReadDeps extends DistrustReadDeps {
  readonly config: Pick<RewardConfig, "serviceActivity">;
  readonly groups: GroupLifecyclePort;
  readonly roster: ServiceRosterPort;
  readonly rewardPool: RewardPoolPort;
  readonly recipients: RecipientBook;
  readonly rewardLedger: RewardLedger;
}

export interface RewardDeps extends RewardReadDeps {
  readonly log: Logger;
  readonly clock: RoundClock;
}

export interface SetRecipientsInput {
  readonly groupId: GroupId;
  readonly caller: string;
  readonly recipients: readonly string[];
  /** Shares in PRECISION units, parallel to recipients */
  readonly basisPoints: readonly bigint[];
}

export interface ClaimRewardInput {
  readonly round: Round;
  readonly account: string;
}

/** One verified group's settled reward in a round */
export interface GroupSettlement {
  readonly verification: GroupVerification;
  readonly eligible: boolean;
  readonly generated: bigint;
  readonly reward: bigint;
  readonly split: RecipientSplit;
  readonly shares: SplitResult;
}

export interface RoundSettlement {
  readonly round: Round;
  readonly pool: bigint;
  readonly totalGenerated: bigint;
  readonly groups: readonly GroupSettlement[];
  /** Sum of group rewards; pool - distributed is burned */
  readonly distributed: bigint;
}
