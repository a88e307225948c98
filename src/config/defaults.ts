/**
 * Default configuration values
 */

import type { BackupzConfig } from "../types";

export const DEFAULT_CONFIG: Partial<BackupzConfig> = {
  syncers: {},
  sources: {},
  retentions: {},
};

/**
 * Printed by `backupz sample-conf`
 */
export const SAMPLE_CONFIG: BackupzConfig = {
  dataset: "backupzpool",
  logfile: "./backupz.log",
  syncers: {
    rsync: {
      command: ["$binary", "@options", "$source", "$destination"],
      binary: "/usr/local/bin/rsync",
      options: ["-aSH", "-essh", "--delete", "--delete-excluded", "--numeric-ids", "--timeout=300"],
    },
  },
  sources: {
    source1: {
      type: "rsync",
      source: "root@machine:/path/to/source",
      destination: "destination-dir",
    },
    source2: {
      type: "rsync",
      source: "root@machine:/path/to/other_source",
      destination: "other_destination-dir",
      extra_options: ["--exclude=somefile"],
    },
  },
  retentions: {
    daily: { keep: 7 },
    weekly: { keep: 5 },
    monthly: { keep: 12 },
    yearly: {},
  },
};

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge<T extends object>(target: T, source: Partial<T>): T {
  const result: Record<string, unknown> = Object.assign<Record<string, unknown>, T>({}, target);

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
