/**
 * Configuration type definitions for backupz
 */

/**
 * A data mover definition. `command` is a token template expanded once per
 * source: `$binary`, `@options`, `$source`, `$destination` or a literal.
 */
export interface SyncerConfig {
  binary: string;
  command: string[];
  options?: string[];
}

export interface SourceConfig {
  /** Key into `syncers` */
  type: string;
  source: string;
  /** Directory under the dataset mountpoint */
  destination: string;
  extra_options?: string[];
}

export type RetentionStrategyName = "generation" | "timestamp";

export interface RetentionConfig {
  /** Absent means keep forever */
  keep?: number;
  /** How snapshots of the class are named and evicted (default: generation) */
  strategy?: RetentionStrategyName;
}

export interface BackupzConfig {
  dataset: string;
  logfile: string;
  lockfile?: string;
  /** Seconds before an external command is killed */
  commandTimeout?: number;
  syncers: Record<string, SyncerConfig>;
  sources: Record<string, SourceConfig>;
  retentions: Record<string, RetentionConfig>;
}

/**
 * Configuration after path resolution. The lockfile is always known here.
 */
export interface ResolvedConfig extends BackupzConfig {
  lockfile: string;
  configPath: string;
}
