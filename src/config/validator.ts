/**
 * Configuration validation
 */

import { findUnknownPlaceholders } from "../core/sync/template";
import type { BackupzConfig } from "../types";
import { ConfigError } from "../utils/errors";

export { ConfigError } from "../utils/errors";

type Validator = (config: Record<string, unknown>) => void;

const STRATEGIES = ["generation", "timestamp"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function requireSection(c: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = c[key];
  if (!isRecord(section)) {
    throw new ConfigError(`'${key}' must be an object of named entries`);
  }
  return section;
}

const validators = {
  dataset: (c) => {
    if (!c.dataset || typeof c.dataset !== "string") {
      throw new ConfigError("Config must have a 'dataset' field");
    }
    if (c.dataset.includes("@")) {
      throw new ConfigError("dataset must name a filesystem, not a snapshot");
    }
  },

  logfile: (c) => {
    if (!c.logfile || typeof c.logfile !== "string") {
      throw new ConfigError("No logfile specified in configuration");
    }
  },

  lockfile: (c) => {
    if (c.lockfile !== undefined && (typeof c.lockfile !== "string" || c.lockfile === "")) {
      throw new ConfigError("lockfile must be a string");
    }
  },

  commandTimeout: (c) => {
    if (
      c.commandTimeout !== undefined &&
      (typeof c.commandTimeout !== "number" || !(c.commandTimeout > 0))
    ) {
      throw new ConfigError("commandTimeout must be a positive number of seconds");
    }
  },

  syncers: (c) => {
    for (const [name, syncer] of Object.entries(requireSection(c, "syncers"))) {
      if (!isRecord(syncer)) {
        throw new ConfigError(`syncers.${name} must be an object`);
      }
      if (!syncer.binary || typeof syncer.binary !== "string") {
        throw new ConfigError(`syncers.${name}.binary must be a string`);
      }
      if (!isStringArray(syncer.command) || syncer.command.length === 0) {
        throw new ConfigError(`syncers.${name}.command must be a non-empty array of strings`);
      }
      const unknown = findUnknownPlaceholders(syncer.command);
      if (unknown.length > 0) {
        throw new ConfigError(`syncers.${name}.command: Unknown command part: ${unknown.join(", ")}`);
      }
      if (syncer.options !== undefined && !isStringArray(syncer.options)) {
        throw new ConfigError(`syncers.${name}.options must be an array of strings`);
      }
    }
  },

  sources: (c) => {
    const syncers = requireSection(c, "syncers");
    for (const [name, source] of Object.entries(requireSection(c, "sources"))) {
      if (!isRecord(source)) {
        throw new ConfigError(`sources.${name} must be an object`);
      }
      if (!source.type || typeof source.type !== "string") {
        throw new ConfigError(`sources.${name}.type must be a string`);
      }
      if (!Object.hasOwn(syncers, source.type)) {
        throw new ConfigError(`Unknown syncer type: ${name}: ${source.type}`);
      }
      if (!source.source || typeof source.source !== "string") {
        throw new ConfigError(`sources.${name}.source must be a string`);
      }
      if (!source.destination || typeof source.destination !== "string") {
        throw new ConfigError(`sources.${name}.destination must be a string`);
      }
      if (source.extra_options !== undefined && !isStringArray(source.extra_options)) {
        throw new ConfigError(`sources.${name}.extra_options must be an array of strings`);
      }
    }
  },

  retentions: (c) => {
    for (const [name, retention] of Object.entries(requireSection(c, "retentions"))) {
      if (!isRecord(retention)) {
        throw new ConfigError(`retentions.${name} must be an object`);
      }
      if (/[@:/\s]/.test(name)) {
        throw new ConfigError(`retentions.${name}: name must not contain '@', ':', '/' or spaces`);
      }
      const keep = retention.keep;
      if (keep !== undefined && (typeof keep !== "number" || !Number.isInteger(keep) || keep < 1)) {
        throw new ConfigError(`retentions.${name}.keep must be a positive integer`);
      }
      const strategy = retention.strategy;
      if (strategy !== undefined && (typeof strategy !== "string" || !STRATEGIES.includes(strategy))) {
        throw new ConfigError(`retentions.${name}.strategy must be one of: ${STRATEGIES.join(", ")}`);
      }
    }
  },
} satisfies Record<string, Validator>;

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is BackupzConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  validators.dataset(config);
  validators.logfile(config);
  validators.lockfile(config);
  validators.commandTimeout(config);
  validators.syncers(config);
  validators.sources(config);
  validators.retentions(config);
}
