import { formatError } from "./errors";
import { fileExists, statOrNull } from "./filesystem";
import { resolveItemPath } from "./paths";
import { inspectTarget, linkStateOf, reconcileBlueprint } from "./reconcile";
import { TOOL_IDS, getToolMapping } from "./tools";
import type { LinkBlueprint, LinkContext, LinkItemType, LinkKind, LinkState } from "./types";

export interface RegistryEntry {
  id: string;
  name: string;
  type: LinkItemType;
  source: string;
  target: string;
}

export interface ConfigRegistry {
  context: LinkContext;
  entries: RegistryEntry[];
}

export type TargetKind = "missing" | "symlink" | "hardlink" | "file" | "directory";

export interface EntryStatus {
  sourceExists: boolean;
  targetExists: boolean;
  targetKind: TargetKind;
  resolvesCorrectly: boolean;
  state: LinkState;
}

export interface RepairResult {
  repaired: string[];
  failures: Array<{ id: string; message: string }>;
}

export function createBlueprintRegistry(
  blueprint: LinkBlueprint,
  context: LinkContext
): ConfigRegistry {
  return {
    context,
    entries: blueprint.links.map((item) => ({
      id: item.id,
      name: item.name,
      type: item.type,
      source: resolveItemPath(item.source, context),
      target: resolveItemPath(item.target, context)
    }))
  };
}

export function createLegacyRegistry(context: LinkContext): ConfigRegistry {
  const entries = TOOL_IDS.flatMap((tool) =>
    getToolMapping(tool, context.platform).files.map((file) => ({
      id: file.id,
      name: file.name,
      type: file.type,
      source: resolveItemPath(file.projectPath, context),
      target: file.systemPath
    }))
  );
  return { context, entries };
}

export async function getEntryStatus(entry: RegistryEntry): Promise<EntryStatus> {
  const info = await inspectTarget(entry.source, entry.target);
  let targetKind: TargetKind = "missing";
  if (info.isSymlink) {
    targetKind = "symlink";
  } else if (info.sameInode) {
    targetKind = "hardlink";
  } else if (info.isDirectory) {
    targetKind = "directory";
  } else if (info.exists) {
    targetKind = "file";
  }
  return {
    sourceExists: await fileExists(entry.source),
    targetExists: info.exists,
    targetKind,
    resolvesCorrectly: (info.isSymlink && info.pointsToSource && !info.dangling) || info.sameInode,
    state: linkStateOf(info)
  };
}

export async function getRegistryStatus(
  registry: ConfigRegistry
): Promise<Record<string, EntryStatus>> {
  const results: Record<string, EntryStatus> = {};
  for (const entry of registry.entries) {
    results[entry.id] = await getEntryStatus(entry);
  }
  return results;
}

/**
 * Linked, and when both ends are regular files their sizes match. Same-size
 * edits are not caught.
 */
export async function validateEntry(entry: RegistryEntry): Promise<boolean> {
  const state = linkStateOf(await inspectTarget(entry.source, entry.target));
  if (state !== "linked") {
    return false;
  }
  const sourceStat = await statOrNull(entry.source);
  const targetStat = await statOrNull(entry.target);
  if (sourceStat?.isFile() && targetStat?.isFile()) {
    return sourceStat.size === targetStat.size;
  }
  return true;
}

export async function validateRegistry(
  registry: ConfigRegistry
): Promise<Record<string, boolean>> {
  const results: Record<string, boolean> = {};
  for (const entry of registry.entries) {
    results[entry.id] = await validateEntry(entry);
  }
  return results;
}

/**
 * Relinks entries whose target is a dangling symlink. Best effort: an entry
 * that cannot be repaired is reported in `failures` and the rest carry on.
 */
export async function repairRegistry(
  registry: ConfigRegistry,
  capabilities: ReadonlySet<LinkKind>,
  linkKind?: LinkKind
): Promise<RepairResult> {
  const broken: RegistryEntry[] = [];
  const failures: RepairResult["failures"] = [];
  for (const entry of registry.entries) {
    try {
      const state = linkStateOf(await inspectTarget(entry.source, entry.target));
      if (state === "broken") {
        broken.push(entry);
      }
    } catch (error) {
      failures.push({ id: entry.id, message: formatError(error) });
    }
  }
  if (broken.length === 0) {
    return { repaired: [], failures };
  }

  const report = await reconcileBlueprint({
    blueprint: {
      version: "repair",
      description: "",
      links: broken.map((entry) => ({
        ...entry,
        createIfMissing: false,
        defaultContent: null
      }))
    },
    context: registry.context,
    capabilities,
    linkKind,
    conflictPolicy: "backup"
  });

  const repaired: string[] = [];
  for (const outcome of report.outcomes) {
    if (outcome.action === "linked") {
      repaired.push(outcome.id);
    } else if (outcome.action === "error") {
      failures.push({ id: outcome.id, message: outcome.error?.message ?? "" });
    } else if (outcome.reason) {
      failures.push({ id: outcome.id, message: outcome.reason.message });
    }
  }
  return { repaired, failures };
}
