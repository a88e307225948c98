/**
 * Centralized type exports for backupz
 */

// Config types
export type {
  BackupzConfig,
  ResolvedConfig,
  RetentionConfig,
  RetentionStrategyName,
  SourceConfig,
  SyncerConfig,
} from "./config";
// Exec types
export type { CommandExecutor, CommandResult, RunOptions } from "./exec";
// Snapshot types
export type { PoolUsage, RotationStep, SnapshotInfo, ZfsListRow } from "./snapshot";
