import { createBackup } from "./backup";
import { AicliLinkError, ErrorKinds, formatError } from "./errors";
import { copyFileOrDir, fileExists, realPathOrNull, removePath } from "./filesystem";
import { resolveItemPath } from "./paths";
import { TOOL_IDS, getToolMapping } from "./tools";
import type { ToolFile, ToolId } from "./tools";
import type { ConflictPolicy, LinkContext } from "./types";

export interface DetectedToolFile extends ToolFile {
  tool: ToolId;
  /** `projectPath` resolved against the project root. */
  projectFile: string;
  found: boolean;
}

export async function detectToolConfigs(
  context: LinkContext,
  tools: readonly ToolId[] = TOOL_IDS
): Promise<DetectedToolFile[]> {
  const detected: DetectedToolFile[] = [];
  for (const tool of tools) {
    for (const file of getToolMapping(tool, context.platform).files) {
      detected.push({
        ...file,
        tool,
        projectFile: resolveItemPath(file.projectPath, context),
        found: await fileExists(file.systemPath)
      });
    }
  }
  return detected;
}

export type ImportAction = "imported" | "overwritten" | "skipped" | "error";

export interface ImportOutcome {
  id: string;
  systemPath: string;
  projectFile: string;
  action: ImportAction;
  backupPath: string | null;
  message?: string;
}

export interface ImportOptions {
  conflictPolicy?: ConflictPolicy;
}

/**
 * Copies a tool's per-user file into the project so it can be linked back.
 * The copy follows symlinks. An existing project file is handled by the
 * conflict policy; without one it is a conflict.
 */
export async function importToolFile(
  file: DetectedToolFile,
  context: LinkContext,
  options: ImportOptions = {}
): Promise<ImportOutcome> {
  const outcome: ImportOutcome = {
    id: file.id,
    systemPath: file.systemPath,
    projectFile: file.projectFile,
    action: "imported",
    backupPath: null
  };
  const resolved = await realPathOrNull(file.systemPath);
  if (resolved === null) {
    throw new AicliLinkError(
      `Nothing to import: ${file.systemPath} does not exist`,
      ErrorKinds.SourceMissing
    );
  }

  if (await fileExists(file.projectFile)) {
    if (resolved === (await realPathOrNull(file.projectFile))) {
      outcome.action = "skipped";
      outcome.message = `Already linked to ${file.projectFile}`;
      return outcome;
    }
    const policy = options.conflictPolicy ?? null;
    if (!policy) {
      throw new AicliLinkError(
        `Project file already exists: ${file.projectFile}`,
        ErrorKinds.TargetConflict
      );
    }
    if (policy === "skip") {
      outcome.action = "skipped";
      outcome.message = `Project file exists: ${file.projectFile}`;
      return outcome;
    }
    if (policy === "backup") {
      outcome.backupPath = await createBackup(file.projectFile, context);
    }
    await removePath(file.projectFile);
    outcome.action = "overwritten";
  }

  await copyFileOrDir(resolved, file.projectFile);
  return outcome;
}

export interface ImportReport {
  outcomes: ImportOutcome[];
  errors: Array<{ id: string; message: string }>;
}

/** Imports every per-user file found for `tools`; one failure does not stop the rest. */
export async function importToolConfigs(
  context: LinkContext,
  tools: readonly ToolId[] = TOOL_IDS,
  options: ImportOptions = {}
): Promise<ImportReport> {
  const outcomes: ImportOutcome[] = [];
  for (const file of await detectToolConfigs(context, tools)) {
    if (!file.found) {
      continue;
    }
    try {
      outcomes.push(await importToolFile(file, context, options));
    } catch (error) {
      outcomes.push({
        id: file.id,
        systemPath: file.systemPath,
        projectFile: file.projectFile,
        action: "error",
        backupPath: null,
        message: formatError(error)
      });
    }
  }
  return {
    outcomes,
    errors: outcomes.flatMap((outcome) =>
      outcome.action === "error" ? [{ id: outcome.id, message: outcome.message ?? "" }] : []
    )
  };
}
