import fs from "fs/promises";
import path from "path";
import { createBackup } from "./backup";
import { assertUniqueIds } from "./blueprint";
import { AicliLinkError, ErrorKinds, formatError } from "./errors";
import type { ErrorKind } from "./errors";
import {
  contentEquals,
  copyFileOrDir,
  ensureDir,
  fileExists,
  hardLinkOrCopy,
  isEmptyDir,
  lstatOrNull,
  readLinkTarget,
  realPathOrNull,
  removePath,
  statOrNull,
  treeEquals
} from "./filesystem";
import { resolveItemPath } from "./paths";
import { linkKindForItem, selectLinkKind } from "./platform";
import type {
  ConflictPolicy,
  ItemOutcome,
  LinkBlueprint,
  LinkContext,
  LinkItem,
  LinkItemType,
  LinkKind,
  LinkState,
  ReconcileCounts,
  ReconcileReport,
  SkipReason
} from "./types";

export interface ReconcileOptions {
  blueprint: LinkBlueprint;
  context: LinkContext;
  capabilities: ReadonlySet<LinkKind>;
  dryRun?: boolean;
  conflictPolicy?: ConflictPolicy;
  linkKind?: LinkKind;
  skipAll?: boolean;
}

export interface TargetInfo {
  exists: boolean;
  isSymlink: boolean;
  isDirectory: boolean;
  isFile: boolean;
  dangling: boolean;
  pointsToSource: boolean;
  sameInode: boolean;
}

const ABSENT_TARGET: TargetInfo = {
  exists: false,
  isSymlink: false,
  isDirectory: false,
  isFile: false,
  dangling: false,
  pointsToSource: false,
  sameInode: false
};

export async function inspectTarget(source: string, target: string): Promise<TargetInfo> {
  const stat = await lstatOrNull(target);
  if (!stat) {
    return ABSENT_TARGET;
  }

  if (stat.isSymbolicLink()) {
    const linkTarget = await readLinkTarget(target);
    const resolved = await realPathOrNull(target);
    // A lexical match still counts when the source does not exist yet.
    let pointsToSource =
      linkTarget !== null &&
      path.resolve(path.dirname(target), linkTarget) === path.resolve(source);
    if (!pointsToSource && resolved !== null) {
      pointsToSource = (await realPathOrNull(source)) === resolved;
    }
    return {
      ...ABSENT_TARGET,
      exists: true,
      isSymlink: true,
      dangling: resolved === null,
      pointsToSource
    };
  }

  let sameInode = false;
  if (!stat.isDirectory()) {
    const sourceStat = await statOrNull(source);
    sameInode =
      sourceStat !== null && sourceStat.ino === stat.ino && sourceStat.dev === stat.dev;
  }
  return {
    ...ABSENT_TARGET,
    exists: true,
    isDirectory: stat.isDirectory(),
    isFile: stat.isFile(),
    sameInode
  };
}

export function linkStateOf(info: TargetInfo): LinkState {
  if (!info.exists) {
    return "unlinked";
  }
  if (!info.isSymlink) {
    return "linked";
  }
  if (info.dangling) {
    return "broken";
  }
  return info.pointsToSource ? "linked" : "linked-elsewhere";
}

export async function inspectLink(source: string, target: string): Promise<LinkState> {
  return linkStateOf(await inspectTarget(source, target));
}

async function attempt<T>(kind: ErrorKind, action: () => Promise<T>, prefix = ""): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof AicliLinkError) {
      throw error;
    }
    throw new AicliLinkError(`${prefix}${formatError(error)}`, kind);
  }
}

async function createSource(source: string, item: LinkItem): Promise<void> {
  if (item.type === "directory") {
    await ensureDir(source);
    return;
  }
  await ensureDir(path.dirname(source));
  await fs.writeFile(source, item.defaultContent ?? "", "utf8");
}

async function createLink(
  source: string,
  target: string,
  kind: LinkKind,
  itemType: LinkItemType
): Promise<LinkKind> {
  await ensureDir(path.dirname(target));
  switch (kind) {
    case "symlink":
      await fs.symlink(source, target, itemType === "directory" ? "dir" : "file");
      return kind;
    case "hardlink":
      return await hardLinkOrCopy(source, target);
    case "copy":
      await copyFileOrDir(source, target);
      return kind;
  }
}

interface ItemSettings {
  context: LinkContext;
  capabilities: ReadonlySet<LinkKind>;
  kind: LinkKind;
  dryRun: boolean;
  conflictPolicy: ConflictPolicy;
  skipAll: boolean;
  // Simulated runs treat these as already on disk.
  plannedSources: Map<string, LinkItem>;
  plannedDirs: Set<string>;
}

function skip(outcome: ItemOutcome, reason: SkipReason): void {
  outcome.decisions.push({ type: "skip", reason: reason.kind });
  outcome.action = "skipped";
  outcome.reason = reason;
}

/**
 * `planned` is the item that would have created the source when the source
 * only exists in a simulated run.
 */
async function isAlreadyLinked(
  info: TargetInfo,
  item: LinkItem,
  kind: LinkKind,
  outcome: ItemOutcome,
  planned: LinkItem | null
): Promise<boolean> {
  if (info.isSymlink) {
    return info.pointsToSource;
  }
  if (info.sameInode) {
    return true;
  }
  if (kind !== "copy") {
    return false;
  }
  if (item.type === "directory") {
    if (!info.isDirectory) {
      return false;
    }
    if (planned) {
      return await isEmptyDir(outcome.target);
    }
    return await treeEquals(outcome.source, outcome.target);
  }
  if (!info.isFile) {
    return false;
  }
  const expected = planned
    ? Buffer.from(planned.defaultContent ?? "", "utf8")
    : await fs.readFile(outcome.source);
  return await contentEquals(outcome.target, expected);
}

async function processItem(
  item: LinkItem,
  settings: ItemSettings,
  outcome: ItemOutcome,
  warnings: string[]
): Promise<void> {
  const { context, dryRun } = settings;
  const { source, target } = outcome;

  const info = await inspectTarget(source, target);
  outcome.state = linkStateOf(info);

  if (settings.skipAll) {
    skip(outcome, { kind: "SkipAll", message: "Skipped (skip-all mode)" });
    return;
  }

  const onDisk = await fileExists(source);
  let planned = dryRun && !onDisk ? settings.plannedSources.get(source) ?? null : null;
  if (!onDisk && !planned) {
    if (!item.createIfMissing) {
      skip(outcome, { kind: ErrorKinds.SourceMissing, message: `Source missing: ${source}` });
      return;
    }
    outcome.decisions.push({ type: "create-source", path: source, itemType: item.type });
    if (dryRun) {
      settings.plannedSources.set(source, item);
      planned = item;
    } else {
      await attempt(ErrorKinds.Filesystem, () => createSource(source, item));
    }
    outcome.sourceCreated = true;
  }

  const kind = linkKindForItem(settings.kind, item.type, settings.capabilities, context.platform);
  if (kind !== settings.kind) {
    warnings.push(`${item.id}: ${settings.kind} cannot link a directory; using ${kind}`);
  }

  if (info.exists) {
    if (await isAlreadyLinked(info, item, kind, outcome, planned)) {
      outcome.decisions.push({ type: "already-linked", target });
      outcome.action = "already-linked";
      return;
    }
    // A broken link holds nothing worth keeping.
    if (!info.dangling) {
      if (settings.conflictPolicy === "skip") {
        skip(outcome, { kind: ErrorKinds.TargetConflict, message: `Target exists: ${target}` });
        return;
      }
      if (settings.conflictPolicy === "backup") {
        outcome.decisions.push({ type: "backup-target", target });
        if (!dryRun) {
          outcome.backupPath = await attempt(
            ErrorKinds.BackupFailed,
            () => createBackup(target, context),
            `Backup of ${target} failed, target left untouched: `
          );
        }
      }
    }
    outcome.decisions.push({ type: "remove-target", target });
    if (!dryRun) {
      await attempt(ErrorKinds.Filesystem, () => removePath(target));
    }
  }

  const parent = path.dirname(target);
  if (!settings.plannedDirs.has(parent) && !(await fileExists(parent))) {
    warnings.push(`Created target parent directory: ${parent} (for ${target})`);
    for (let dir = parent; dir !== path.dirname(dir); dir = path.dirname(dir)) {
      settings.plannedDirs.add(dir);
    }
  }
  outcome.decisions.push({ type: "create-link", kind, source, target });
  let used = kind;
  if (!dryRun) {
    used = await attempt(ErrorKinds.LinkCreationFailed, () =>
      createLink(source, target, kind, item.type)
    );
  }
  if (used !== kind) {
    warnings.push(`${item.id}: ${kind} is not possible across devices; copied ${target} instead`);
  }
  outcome.linkKind = used;
  outcome.action = "linked";
}

function countOutcomes(outcomes: ItemOutcome[]): ReconcileCounts {
  return {
    created: outcomes.filter((outcome) => outcome.sourceCreated).length,
    linked: outcomes.filter((outcome) => outcome.action === "linked").length,
    alreadyLinked: outcomes.filter((outcome) => outcome.action === "already-linked").length,
    skipped: outcomes.filter((outcome) => outcome.action === "skipped").length,
    errored: outcomes.filter((outcome) => outcome.action === "error").length
  };
}

/**
 * Converges every blueprint item, in order, towards "target links to source".
 *
 * Items never share failures: an error is recorded on the item's outcome and
 * the next item is processed. In dry-run mode the same decisions are reported
 * but nothing on disk changes.
 */
export async function reconcileBlueprint(options: ReconcileOptions): Promise<ReconcileReport> {
  const { blueprint, context, capabilities } = options;
  const dryRun = options.dryRun ?? false;
  assertUniqueIds(blueprint);

  const selection = selectLinkKind(capabilities, context.platform, options.linkKind);
  const warnings = [...selection.warnings];
  const settings: ItemSettings = {
    context,
    capabilities,
    kind: selection.kind,
    dryRun,
    conflictPolicy: options.conflictPolicy ?? "backup",
    skipAll: options.skipAll ?? false,
    plannedSources: new Map(),
    plannedDirs: new Set()
  };

  const outcomes: ItemOutcome[] = [];
  for (const item of blueprint.links) {
    const outcome: ItemOutcome = {
      id: item.id,
      name: item.name,
      source: resolveItemPath(item.source, context),
      target: resolveItemPath(item.target, context),
      state: "unlinked",
      action: "skipped",
      sourceCreated: false,
      linkKind: null,
      backupPath: null,
      decisions: []
    };
    try {
      await processItem(item, settings, outcome, warnings);
    } catch (error) {
      outcome.action = "error";
      outcome.error = {
        kind: error instanceof AicliLinkError ? error.kind : ErrorKinds.Filesystem,
        message: formatError(error)
      };
    }
    outcomes.push(outcome);
  }

  return {
    dryRun,
    linkKind: selection.kind,
    outcomes,
    counts: countOutcomes(outcomes),
    errors: outcomes.flatMap((outcome) =>
      outcome.error ? [{ id: outcome.id, message: outcome.error.message }] : []
    ),
    warnings
  };
}
