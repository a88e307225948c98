/**
 * zfs CLI wrapper. Every call goes through the run context's executor.
 */

import type { CommandExecutor, CommandResult, ZfsListRow } from "../types";
import { CommandFailedError, ConfigError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { formatCommandFailure } from "../utils/shell";

export const ZFS_BINARY = "zfs";

export interface ZfsContext {
  executor: CommandExecutor;
  logger: Logger;
  dataset: string;
  /** Milliseconds */
  timeout?: number;
}

export interface ZfsCommand {
  argv: string[];
  result: CommandResult;
}

export function snapshotPath(dataset: string, shortName: string): string {
  return `${dataset}@${shortName}`;
}

export async function zfsRun(ctx: ZfsContext, args: string[]): Promise<ZfsCommand> {
  const argv = [ZFS_BINARY, ...args];
  ctx.logger.debug(`Running: ${argv.join(" ")}`);
  const result = await ctx.executor.run(argv, { timeout: ctx.timeout });
  return { argv, result };
}

/**
 * Run a zfs command; on failure log the record and throw
 */
export async function zfsRunOrFail(
  ctx: ZfsContext,
  args: string[],
  failureMessage: string,
): Promise<ZfsCommand> {
  const command = await zfsRun(ctx, args);
  if (!command.result.success) {
    ctx.logger.record("error", formatCommandFailure(failureMessage, command.argv, command.result));
    throw new CommandFailedError(failureMessage, command.argv, command.result);
  }
  return command;
}

/**
 * Short names (after `@`) of the dataset's own snapshots
 */
export async function listSnapshotNames(ctx: ZfsContext): Promise<string[]> {
  const { result } = await zfsRunOrFail(
    ctx,
    ["list", "-H", "-p", "-t", "snapshot", "-o", "name", "-d", "1", ctx.dataset],
    `Error listing snapshots of ${ctx.dataset}`,
  );

  const prefix = `${ctx.dataset}@`;
  return result.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith(prefix))
    .map((line) => line.slice(prefix.length));
}

/**
 * The dataset row and its snapshot rows, in one lister call
 */
export async function listDatasetUsage(ctx: ZfsContext): Promise<ZfsListRow[]> {
  const { result } = await zfsRunOrFail(
    ctx,
    [
      "list",
      "-H",
      "-p",
      "-o",
      "name,used,avail,refer,creation",
      "-t",
      "filesystem,snapshot",
      "-d",
      "1",
      ctx.dataset,
    ],
    `Error listing ${ctx.dataset}`,
  );
  return parseZfsList(result.stdout);
}

function parseBytes(value: string): number | null {
  if (value === "-" || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse tab-separated `name,used,avail,refer,creation` rows printed with `-H -p`.
 * Lines without five columns are skipped.
 */
export function parseZfsList(stdout: string): ZfsListRow[] {
  const rows: ZfsListRow[] = [];
  for (const line of stdout.split("\n")) {
    const [name, used, avail, refer, creation, ...rest] = line.split("\t");
    if (
      name === undefined ||
      name === "" ||
      used === undefined ||
      avail === undefined ||
      refer === undefined ||
      creation === undefined ||
      rest.length > 0
    ) {
      continue;
    }
    rows.push({
      name,
      used: parseBytes(used) ?? 0,
      avail: parseBytes(avail),
      refer: parseBytes(refer) ?? 0,
      creation: parseBytes(creation) ?? 0,
    });
  }
  return rows;
}

export async function getMountpoint(ctx: ZfsContext): Promise<string> {
  const { result } = await zfsRun(ctx, ["get", "-H", "-o", "value", "mountpoint", ctx.dataset]);
  if (!result.success) {
    throw new ConfigError(`Error getting mountpoint for dataset: ${result.stderr}`);
  }
  const mountpoint = result.stdout.trim();
  if (mountpoint === "" || !mountpoint.startsWith("/")) {
    throw new ConfigError(`Dataset ${ctx.dataset} has no usable mountpoint: ${mountpoint || "(empty)"}`);
  }
  return mountpoint;
}

export function createSnapshot(ctx: ZfsContext, shortName: string): Promise<ZfsCommand> {
  return zfsRunOrFail(
    ctx,
    ["snapshot", snapshotPath(ctx.dataset, shortName)],
    `Error creating snapshot: ${shortName}`,
  );
}

export function destroySnapshot(ctx: ZfsContext, shortName: string): Promise<ZfsCommand> {
  return zfsRunOrFail(
    ctx,
    ["destroy", snapshotPath(ctx.dataset, shortName)],
    `Error destroying snapshot: ${shortName}`,
  );
}

export function renameSnapshot(ctx: ZfsContext, from: string, to: string): Promise<ZfsCommand> {
  return zfsRunOrFail(
    ctx,
    ["rename", snapshotPath(ctx.dataset, from), snapshotPath(ctx.dataset, to)],
    `Error renaming snapshot: ${from} to ${to}`,
  );
}
