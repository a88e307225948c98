/**
 * Snapshot, source and retention listings
 */

import type { BackupzConfig, PoolUsage, SnapshotInfo, ZfsListRow } from "../../types";
import { UsageError } from "../../utils/errors";
import { formatBytes, formatLocalTimestamp } from "../../utils/format";
import { listDatasetUsage } from "../../zfs";
import { type RunContext, toZfsContext } from "../context";
import { DEFAULT_STRATEGY } from "../retention/rotate";
import { parseSnapshotName } from "../retention/names";

export const LIST_KINDS = ["snapshots", "sources", "retentions"] as const;

export type ListKind = (typeof LIST_KINDS)[number];

export function parseListKind(value: string | undefined): ListKind {
  if (value === undefined) return "snapshots";
  const kind = LIST_KINDS.find((k) => k === value);
  if (!kind) {
    throw new UsageError(`Unknown list type: ${value}`);
  }
  return kind;
}

export interface SnapshotReport {
  pool: PoolUsage | null;
  /** Snapshots whose class is configured, newest first */
  managed: SnapshotInfo[];
  /** Everything else, newest first */
  unmanaged: SnapshotInfo[];
}

export interface ReportSection {
  title: string;
  headers: string[];
  rows: string[][];
}

function newestFirst(a: SnapshotInfo, b: SnapshotInfo): number {
  if (a.creation !== b.creation) return b.creation - a.creation;
  return a.shortName < b.shortName ? 1 : a.shortName > b.shortName ? -1 : 0;
}

/**
 * Split lister rows into the dataset's own row and its classified snapshots.
 * Rows for other datasets are ignored.
 */
export function buildSnapshotReport(
  dataset: string,
  retentions: BackupzConfig["retentions"],
  rows: ZfsListRow[],
): SnapshotReport {
  const report: SnapshotReport = { pool: null, managed: [], unmanaged: [] };
  const prefix = `${dataset}@`;

  for (const row of rows) {
    if (row.name === dataset) {
      report.pool = { name: row.name, used: row.used, avail: row.avail ?? 0 };
      continue;
    }
    if (!row.name.startsWith(prefix)) continue;

    const shortName = row.name.slice(prefix.length);
    const { retention } = parseSnapshotName(shortName);
    const snapshot: SnapshotInfo = { ...row, shortName, retention };

    if (Object.hasOwn(retentions, retention)) {
      report.managed.push(snapshot);
    } else {
      report.unmanaged.push(snapshot);
    }
  }

  report.managed.sort(newestFirst);
  report.unmanaged.sort(newestFirst);
  return report;
}

export async function collectSnapshotReport(ctx: RunContext): Promise<SnapshotReport> {
  const rows = await listDatasetUsage(toZfsContext(ctx));
  return buildSnapshotReport(ctx.config.dataset, ctx.config.retentions, rows);
}

function snapshotRow(snapshot: SnapshotInfo): string[] {
  return [
    formatBytes(snapshot.used),
    formatBytes(snapshot.refer),
    formatLocalTimestamp(new Date(snapshot.creation * 1000)),
    snapshot.shortName,
  ];
}

export function snapshotReportSections(report: SnapshotReport): ReportSection[] {
  const snapshotHeaders = ["Used", "Refer", "Created", "Snapshot"];
  return [
    {
      title: "Pool",
      headers: ["Used", "Avail", "Dataset"],
      rows: report.pool
        ? [[formatBytes(report.pool.used), formatBytes(report.pool.avail), report.pool.name]]
        : [],
    },
    {
      title: "Managed snapshots",
      headers: snapshotHeaders,
      rows: report.managed.map(snapshotRow),
    },
    {
      title: "Unmanaged snapshots",
      headers: snapshotHeaders,
      rows: report.unmanaged.map(snapshotRow),
    },
  ];
}

export function sourceRows(config: BackupzConfig, verbose: boolean): string[][] {
  return Object.entries(config.sources).map(([name, source]) =>
    verbose ? [name, source.source, `${config.dataset}/${source.destination}`, source.type] : [name],
  );
}

export function retentionRows(config: BackupzConfig, verbose: boolean): string[][] {
  return Object.entries(config.retentions).map(([name, retention]) =>
    verbose
      ? [name, retention.keep === undefined ? "forever" : String(retention.keep), retention.strategy ?? DEFAULT_STRATEGY]
      : [name],
  );
}
