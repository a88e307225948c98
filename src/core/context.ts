/**
 * Per-invocation state handed to every core operation
 */

import type { CommandExecutor, ResolvedConfig } from "../types";
import type { Logger } from "../utils/logger";
import type { ZfsContext } from "../zfs";

export interface RunContext {
  config: ResolvedConfig;
  /** Number of `-v` flags */
  verbosity: number;
  logger: Logger;
  executor: CommandExecutor;
  /** Plan and log mutating commands without running them */
  dryRun: boolean;
  /** Clock for snapshot timestamps */
  now?: () => Date;
}

export function toZfsContext(ctx: RunContext): ZfsContext {
  return {
    executor: ctx.executor,
    logger: ctx.logger,
    dataset: ctx.config.dataset,
    timeout: commandTimeoutMs(ctx),
  };
}

export function commandTimeoutMs(ctx: RunContext): number | undefined {
  const seconds = ctx.config.commandTimeout;
  return seconds === undefined ? undefined : seconds * 1000;
}
