/**
 * Configuration path resolution and lookups
 */

import * as os from "node:os";
import * as path from "node:path";
import type { BackupzConfig, ResolvedConfig, RetentionConfig, SourceConfig, SyncerConfig } from "../types";
import { ConfigError } from "./validator";

/**
 * Lock file used when the configuration names none
 */
export function defaultLockfile(dataset: string): string {
  return path.join(os.tmpdir(), `backupz-${dataset.replace(/\//g, "_")}.lock`);
}

/**
 * Resolve relative paths against the config file's directory and derive the lockfile
 */
export function resolvePaths(config: BackupzConfig, configPath: string): ResolvedConfig {
  const configDir = path.dirname(path.resolve(configPath));

  return {
    ...config,
    logfile: path.resolve(configDir, config.logfile),
    lockfile: config.lockfile
      ? path.resolve(configDir, config.lockfile)
      : defaultLockfile(config.dataset),
    configPath: path.resolve(configPath),
  };
}

export function getSyncerForSource(
  config: BackupzConfig,
  sourceName: string,
): SyncerConfig {
  const source = Object.hasOwn(config.sources, sourceName) ? config.sources[sourceName] : undefined;
  if (!source) {
    throw new ConfigError(`Unknown source: ${sourceName}`);
  }
  const syncer = Object.hasOwn(config.syncers, source.type) ? config.syncers[source.type] : undefined;
  if (!syncer) {
    throw new ConfigError(`Unknown syncer type: ${sourceName}: ${source.type}`);
  }
  return syncer;
}

/**
 * `syncer.options` followed by the source's `extra_options`
 */
export function getSyncOptions(syncer: SyncerConfig, source: SourceConfig): string[] {
  return [...(syncer.options ?? []), ...(source.extra_options ?? [])];
}

export function getRetention(config: BackupzConfig, name: string): RetentionConfig | undefined {
  return Object.hasOwn(config.retentions, name) ? config.retentions[name] : undefined;
}
