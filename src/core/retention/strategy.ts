/**
 * Retention strategy contract
 */

import type { RetentionConfig, RetentionStrategyName, RotationStep } from "../../types";

export interface RotationPlan {
  steps: RotationStep[];
  /** Conditions worth logging that do not stop the rotation */
  warnings: string[];
}

export interface PlanInput {
  retention: string;
  config: RetentionConfig;
  /** Short names of every snapshot of the dataset */
  existing: string[];
  now: Date;
}

/**
 * Turns the current snapshots of a class into the ordered steps of one rotation
 */
export interface RetentionStrategy {
  readonly name: RetentionStrategyName;
  plan(input: PlanInput): RotationPlan;
}
