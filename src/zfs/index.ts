export {
  createSnapshot,
  destroySnapshot,
  getMountpoint,
  listDatasetUsage,
  listSnapshotNames,
  parseZfsList,
  renameSnapshot,
  snapshotPath,
  ZFS_BINARY,
  type ZfsCommand,
  type ZfsContext,
  zfsRun,
  zfsRunOrFail,
} from "./client";
