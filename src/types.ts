import type { ErrorKind } from "./errors";

export type LinkItemType = "file" | "directory";

export type LinkKind = "symlink" | "hardlink" | "copy";

export type ConflictPolicy = "backup" | "overwrite" | "skip";

export type OsFamily = "linux" | "macos" | "windows" | "other";

export interface LinkItem {
  id: string;
  name: string;
  type: LinkItemType;
  source: string;
  target: string;
  createIfMissing: boolean;
  defaultContent: string | null;
}

export interface LinkBlueprint {
  version: string;
  description: string;
  links: LinkItem[];
}

export type LinkState = "unlinked" | "linked" | "broken" | "linked-elsewhere";

export interface PlatformInfo {
  os: OsFamily;
  isWsl: boolean;
  supportsSymlinks: boolean;
  homeDir: string;
  appDataDir: string | null;
}

export interface LinkContext {
  readonly platform: PlatformInfo;
  readonly projectRoot: string;
  readonly now: () => Date;
}

export type SkipReasonKind = "SourceMissing" | "TargetConflict" | "SkipAll";

export interface SkipReason {
  kind: SkipReasonKind;
  message: string;
}

export type ReconcileDecision =
  | { type: "skip"; reason: SkipReasonKind }
  | { type: "create-source"; path: string; itemType: LinkItemType }
  | { type: "already-linked"; target: string }
  | { type: "backup-target"; target: string }
  | { type: "remove-target"; target: string }
  | { type: "create-link"; kind: LinkKind; source: string; target: string };

export type ReconcileAction = "linked" | "already-linked" | "skipped" | "error";

export interface ItemError {
  kind: ErrorKind;
  message: string;
}

export interface ItemOutcome {
  id: string;
  name: string;
  source: string;
  target: string;
  state: LinkState;
  action: ReconcileAction;
  sourceCreated: boolean;
  linkKind: LinkKind | null;
  backupPath: string | null;
  decisions: ReconcileDecision[];
  reason?: SkipReason;
  error?: ItemError;
}

export interface ReconcileCounts {
  created: number;
  linked: number;
  alreadyLinked: number;
  skipped: number;
  errored: number;
}

export interface ReconcileReport {
  dryRun: boolean;
  linkKind: LinkKind;
  outcomes: ItemOutcome[];
  counts: ReconcileCounts;
  errors: Array<{ id: string; message: string }>;
  warnings: string[];
}

export type UnlinkAction = "unlinked" | "restored" | "skipped" | "error";

export interface UnlinkOutcome {
  id: string;
  target: string;
  state: LinkState;
  action: UnlinkAction;
  message?: string;
}

export interface UnlinkReport {
  dryRun: boolean;
  outcomes: UnlinkOutcome[];
  errors: Array<{ id: string; message: string }>;
}
