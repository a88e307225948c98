/**
 * Core module exports
 */

export { commandTimeoutMs, type RunContext, toZfsContext } from "./context";

// Listing
export {
  buildSnapshotReport,
  collectSnapshotReport,
  LIST_KINDS,
  type ListKind,
  parseListKind,
  type ReportSection,
  retentionRows,
  type SnapshotReport,
  snapshotReportSections,
  sourceRows,
} from "./listing";

// Retention
export {
  describeStep,
  getStrategy,
  parseSnapshotName,
  type RetentionStrategy,
  type RotationResult,
  rotateRetention,
} from "./retention";

// Sync
export {
  expandCommandTemplate,
  runSync,
  type SyncResult,
  selectSources,
} from "./sync";
