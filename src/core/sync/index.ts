/**
 * Sync module exports
 */

export {
  buildSyncCommands,
  runSync,
  type SyncCommand,
  type SyncOptions,
  type SyncResult,
  selectSources,
} from "./dispatcher";
export {
  expandCommandTemplate,
  findUnknownPlaceholders,
  PLACEHOLDERS,
  type Placeholder,
  type TemplateBinding,
} from "./template";
