/**
 * Run context construction for verbs that read the configuration
 */

import * as fs from "node:fs/promises";
import { loadConfig } from "../config";
import type { RunContext } from "../core";
import { execaExecutor } from "../exec";
import type { CommandExecutor } from "../types";
import { ConfigError, createLogger, errorMessage, levelForVerbosity, UsageError } from "../utils";

export interface ContextOptions {
  config: string | undefined;
  verbosity: number;
  dryRun?: boolean;
  executor?: CommandExecutor;
}

export async function createRunContext(options: ContextOptions): Promise<RunContext> {
  if (!options.config) {
    throw new UsageError("No configuration file specified, use -c <file>");
  }

  const config = await loadConfig(options.config);

  try {
    await fs.appendFile(config.logfile, "");
  } catch (error) {
    throw new ConfigError(`Can't open log file: ${config.logfile}: ${errorMessage(error)}`);
  }

  const logger = createLogger({
    level: levelForVerbosity(options.verbosity),
    logfile: config.logfile,
    fileLevel: options.verbosity >= 2 ? "debug" : "info",
  });

  return {
    config,
    verbosity: options.verbosity,
    logger,
    executor: options.executor ?? execaExecutor,
    dryRun: options.dryRun ?? false,
  };
}
