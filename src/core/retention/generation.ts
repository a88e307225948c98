/**
 * Generation rotation: numbered slots `<class>.0` (newest) to `<class>.<keep-1>`.
 * The oldest slot is destroyed, the others shift up by one, a new `.0` is created.
 */

import type { RotationStep } from "../../types";
import { generationName, parseSnapshotName } from "./names";
import type { PlanInput, RotationPlan, RetentionStrategy } from "./strategy";

/**
 * Slots of `retention` present in `existing`, ignoring non-canonical names like `daily.01`
 */
export function existingSlots(retention: string, existing: string[]): Set<number> {
  const slots = new Set<number>();
  for (const shortName of existing) {
    const parsed = parseSnapshotName(shortName);
    if (
      parsed.retention === retention &&
      parsed.generation !== undefined &&
      generationName(retention, parsed.generation) === shortName
    ) {
      slots.add(parsed.generation);
    }
  }
  return slots;
}

export function planGenerationRotation({ retention, config, existing }: PlanInput): RotationPlan {
  const slots = existingSlots(retention, existing);
  const steps: RotationStep[] = [];
  const warnings: string[] = [];

  let highestToShift: number;
  if (config.keep !== undefined) {
    const maxSlot = config.keep - 1;
    if (slots.has(maxSlot)) {
      steps.push({ kind: "destroy", snapshot: generationName(retention, maxSlot) });
    }
    highestToShift = maxSlot - 1;

    const beyond = [...slots].filter((slot) => slot > maxSlot).sort((a, b) => a - b);
    if (beyond.length > 0) {
      warnings.push(
        `Snapshots beyond keep=${config.keep} are left alone: ${beyond
          .map((slot) => generationName(retention, slot))
          .join(", ")}`,
      );
    }
  } else {
    highestToShift = slots.size > 0 ? Math.max(...slots) : -1;
  }

  // descending, so slot i+1 is already free when slot i moves into it
  for (let i = highestToShift; i >= 0; i--) {
    if (slots.has(i)) {
      steps.push({
        kind: "rename",
        from: generationName(retention, i),
        to: generationName(retention, i + 1),
      });
    }
  }

  steps.push({ kind: "create", snapshot: generationName(retention, 0) });

  return { steps, warnings };
}

export const generationStrategy: RetentionStrategy = {
  name: "generation",
  plan: planGenerationRotation,
};
