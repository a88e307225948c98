/**
 * Retention module exports
 */

export { existingSlots, generationStrategy, planGenerationRotation } from "./generation";
export {
  generationName,
  type ParsedSnapshotName,
  parseSnapshotName,
  timestampName,
} from "./names";
export {
  DEFAULT_STRATEGY,
  describeStep,
  getStrategy,
  type RotationResult,
  rotateRetention,
} from "./rotate";
export type { PlanInput, RetentionStrategy, RotationPlan } from "./strategy";
export { planTimestampRotation, timestampedSnapshots, timestampStrategy } from "./timestamp";
