/**
 * Timestamp prune: snapshots named `<class>:YYYY-MM-DDTHH:MM:SS`. When the class
 * holds exactly `keep` snapshots the oldest one is destroyed before the new one
 * is created.
 */

import type { RotationStep } from "../../types";
import { timestampName } from "./names";
import type { PlanInput, RotationPlan, RetentionStrategy } from "./strategy";

/**
 * Snapshots of `retention`, oldest first. ISO timestamps sort lexically.
 */
export function timestampedSnapshots(retention: string, existing: string[]): string[] {
  const prefix = `${retention}:`;
  return existing.filter((name) => name.startsWith(prefix)).sort();
}

export function planTimestampRotation({ retention, config, existing, now }: PlanInput): RotationPlan {
  const own = timestampedSnapshots(retention, existing);
  const steps: RotationStep[] = [];
  const warnings: string[] = [];

  if (config.keep !== undefined) {
    const oldest = own[0];
    if (own.length === config.keep && oldest !== undefined) {
      steps.push({ kind: "destroy", snapshot: oldest });
    } else if (own.length > config.keep) {
      // one eviction per run; an overfull class is reported, not drained
      warnings.push(
        `${retention} holds ${own.length} snapshots, more than keep=${config.keep}; nothing pruned`,
      );
    }
  }

  steps.push({ kind: "create", snapshot: timestampName(retention, now) });

  return { steps, warnings };
}

export const timestampStrategy: RetentionStrategy = {
  name: "timestamp",
  plan: planTimestampRotation,
};
