/**
 * Sync orchestration: one syncer run per selected source
 */

import { getSyncerForSource, getSyncOptions } from "../../config/resolver";
import { formatDuration } from "../../utils/format";
import { UsageError } from "../../utils/errors";
import { formatCommandFailure, quoteCommand } from "../../utils/shell";
import { getMountpoint } from "../../zfs";
import { commandTimeoutMs, type RunContext, toZfsContext } from "../context";
import { expandCommandTemplate } from "./template";

export interface SyncCommand {
  name: string;
  source: string;
  destination: string;
  argv: string[];
}

export interface SyncResult {
  name: string;
  command: string[];
  success: boolean;
  exitCode: number;
  durationMs: number;
}

export interface SyncOptions {
  /** Skips the `zfs get mountpoint` lookup */
  mountpoint?: string;
}

/**
 * Names to sync, in configuration order. Every requested name must exist;
 * duplicates and request order do not matter. Empty selects everything.
 */
export function selectSources(configured: string[], requested: string[]): string[] {
  for (const name of requested) {
    if (!configured.includes(name)) {
      throw new UsageError(`Unknown source: ${name}`);
    }
  }
  if (requested.length === 0) {
    return configured;
  }
  const wanted = new Set(requested);
  return configured.filter((name) => wanted.has(name));
}

/**
 * Build every command up front so configuration errors surface before anything runs
 */
export function buildSyncCommands(
  ctx: RunContext,
  names: string[],
  mountpoint: string,
): SyncCommand[] {
  return names.map((name) => {
    const syncer = getSyncerForSource(ctx.config, name);
    const source = ctx.config.sources[name];
    if (!source) {
      throw new UsageError(`Unknown source: ${name}`);
    }
    const destination = `${mountpoint}/${source.destination}`;
    const argv = expandCommandTemplate(syncer.command, {
      binary: syncer.binary,
      options: getSyncOptions(syncer, source),
      source: source.source,
      destination,
    });
    return { name, source: source.source, destination: source.destination, argv };
  });
}

/**
 * Sync the requested sources (all of them when `requested` is empty).
 * A failing source is logged and the next one still runs.
 */
export async function runSync(
  ctx: RunContext,
  requested: string[],
  options: SyncOptions = {},
): Promise<SyncResult[]> {
  const names = selectSources(Object.keys(ctx.config.sources), requested);
  if (names.length === 0) {
    ctx.logger.info("No sources configured, nothing to sync");
    return [];
  }

  const mountpoint = options.mountpoint ?? (await getMountpoint(toZfsContext(ctx)));
  const commands = buildSyncCommands(ctx, names, mountpoint);
  const results: SyncResult[] = [];

  for (const command of commands) {
    if (ctx.dryRun) {
      ctx.logger.info(`[DRY RUN] Would sync ${command.source} to ${command.destination}: ${quoteCommand(command.argv)}`);
      results.push({ name: command.name, command: command.argv, success: true, exitCode: 0, durationMs: 0 });
      continue;
    }

    ctx.logger.info(`Syncing ${command.source} to ${command.destination}`);
    ctx.logger.debug(`Running: ${quoteCommand(command.argv)}`);

    const started = Date.now();
    const result = await ctx.executor.run(command.argv, { timeout: commandTimeoutMs(ctx) });
    const durationMs = Date.now() - started;

    if (result.success) {
      ctx.logger.info(`Synced ${command.name} in ${formatDuration(durationMs)}`);
    } else {
      ctx.logger.record(
        "error",
        formatCommandFailure(
          `Error syncing ${command.source} to ${command.destination}`,
          command.argv,
          result,
        ),
      );
    }

    results.push({
      name: command.name,
      command: command.argv,
      success: result.success,
      exitCode: result.exitCode,
      durationMs,
    });
  }

  return results;
}
