/**
 * Listing module exports
 */

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
} from "./report";
