/**
 * Snapshot type definitions
 */

/**
 * One row of `zfs list -H -p -o name,used,avail,refer,creation`.
 * `avail` is `null` for snapshots, where zfs prints "-".
 */
export interface ZfsListRow {
  name: string;
  used: number;
  avail: number | null;
  refer: number;
  creation: number;
}

export interface SnapshotInfo extends ZfsListRow {
  /** The part after `@` */
  shortName: string;
  /** Retention class parsed from the short name */
  retention: string;
}

export interface PoolUsage {
  name: string;
  used: number;
  avail: number;
}

export type RotationStep =
  | { kind: "destroy"; snapshot: string }
  | { kind: "rename"; from: string; to: string }
  | { kind: "create"; snapshot: string };
