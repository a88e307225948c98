/**
 * Snapshot rotation for one retention class
 */

import { getRetention } from "../../config/resolver";
import type { RetentionStrategyName, RotationStep } from "../../types";
import { PolicyError } from "../../utils/errors";
import {
  createSnapshot,
  destroySnapshot,
  listSnapshotNames,
  renameSnapshot,
  type ZfsContext,
} from "../../zfs";
import { type RunContext, toZfsContext } from "../context";
import { generationStrategy } from "./generation";
import type { RetentionStrategy } from "./strategy";
import { timestampStrategy } from "./timestamp";

const STRATEGIES: Record<RetentionStrategyName, RetentionStrategy> = {
  generation: generationStrategy,
  timestamp: timestampStrategy,
};

export const DEFAULT_STRATEGY: RetentionStrategyName = "generation";

export function getStrategy(name: RetentionStrategyName = DEFAULT_STRATEGY): RetentionStrategy {
  return STRATEGIES[name];
}

export interface RotationResult {
  retention: string;
  strategy: RetentionStrategyName;
  /** Steps in the order they ran (or would run, on a dry run) */
  steps: RotationStep[];
  dryRun: boolean;
}

export function describeStep(step: RotationStep): string {
  switch (step.kind) {
    case "destroy":
      return `destroy snapshot ${step.snapshot}`;
    case "rename":
      return `rename snapshot ${step.from} to ${step.to}`;
    case "create":
      return `create snapshot ${step.snapshot}`;
  }
}

async function applyStep(zfs: ZfsContext, step: RotationStep): Promise<void> {
  switch (step.kind) {
    case "destroy":
      zfs.logger.info(`Destroying snapshot ${step.snapshot}`);
      await destroySnapshot(zfs, step.snapshot);
      return;
    case "rename":
      zfs.logger.info(`Renaming snapshot ${step.from} to ${step.to}`);
      await renameSnapshot(zfs, step.from, step.to);
      return;
    case "create":
      zfs.logger.info(`Creating snapshot: ${step.snapshot}`);
      await createSnapshot(zfs, step.snapshot);
      return;
  }
}

/**
 * Rotate `retentionName`: evict, shift or prune per its strategy, then create
 * one new snapshot. The first failing zfs command aborts the rotation with a
 * CommandFailedError.
 */
export async function rotateRetention(ctx: RunContext, retentionName: string): Promise<RotationResult> {
  const retention = getRetention(ctx.config, retentionName);
  if (!retention) {
    throw new PolicyError(`Unknown retention level: ${retentionName}`);
  }

  const strategy = getStrategy(retention.strategy);
  const zfs = toZfsContext(ctx);
  const now = ctx.now ?? (() => new Date());

  ctx.logger.debug(`Rotating ${retentionName} (${strategy.name}, keep=${retention.keep ?? "forever"})`);

  const existing = await listSnapshotNames(zfs);
  const plan = strategy.plan({
    retention: retentionName,
    config: retention,
    existing,
    now: now(),
  });

  for (const warning of plan.warnings) {
    ctx.logger.warn(warning);
  }

  for (const step of plan.steps) {
    if (ctx.dryRun) {
      ctx.logger.info(`[DRY RUN] Would ${describeStep(step)}`);
      continue;
    }
    await applyStep(zfs, step);
  }

  return {
    retention: retentionName,
    strategy: strategy.name,
    steps: plan.steps,
    dryRun: ctx.dryRun,
  };
}
