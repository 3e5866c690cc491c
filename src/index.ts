export { createBackup, formatBackupTimestamp, getBackupDir, listBackups, restoreBackup } from "./backup";
export {
  BLUEPRINT_FILE,
  findBlueprintPath,
  parseBlueprint,
  readBlueprint,
  readBlueprintFile,
  serializeBlueprint,
  writeBlueprint
} from "./blueprint";
export { AicliLinkError, ErrorKinds, ExitCodes } from "./errors";
export type { ErrorKind, ExitCode } from "./errors";
export { detectToolConfigs, importToolConfigs, importToolFile } from "./importer";
export type { DetectedToolFile, ImportOptions, ImportOutcome, ImportReport } from "./importer";
export { ensureSourceDirectories, initBlueprint } from "./init";
export type { InitOptions } from "./init";
export { expandHome, resolveItemPath } from "./paths";
export {
  createLinkContext,
  detectPlatform,
  detectWsl,
  linkKindForItem,
  probeLinkCapabilities,
  selectLinkKind
} from "./platform";
export type { DetectOptions, LinkKindSelection } from "./platform";
export { inspectLink, inspectTarget, linkStateOf, reconcileBlueprint } from "./reconcile";
export type { ReconcileOptions, TargetInfo } from "./reconcile";
export {
  createBlueprintRegistry,
  createLegacyRegistry,
  getEntryStatus,
  getRegistryStatus,
  repairRegistry,
  validateEntry,
  validateRegistry
} from "./registry";
export type { ConfigRegistry, EntryStatus, RegistryEntry, RepairResult, TargetKind } from "./registry";
export { createDefaultBlueprint } from "./templates";
export { TOOL_IDS, getToolMapping, isToolId } from "./tools";
export type { ToolId, ToolMapping } from "./tools";
export { unlinkBlueprint } from "./unlink";
export type { UnlinkOptions } from "./unlink";
export type * from "./types";
