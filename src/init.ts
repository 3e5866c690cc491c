import path from "path";
import { createBackup } from "./backup";
import { BLUEPRINT_FILE, writeBlueprint } from "./blueprint";
import { AicliLinkError, ErrorKinds } from "./errors";
import { ensureDir, fileExists } from "./filesystem";
import { resolveItemPath } from "./paths";
import { createDefaultBlueprint } from "./templates";
import type { ConflictPolicy, LinkBlueprint, LinkContext } from "./types";

// Only project-relative sources belong to the repository.
export async function ensureSourceDirectories(
  blueprint: LinkBlueprint,
  context: LinkContext
): Promise<void> {
  for (const item of blueprint.links) {
    if (item.source.startsWith("~") || path.isAbsolute(item.source)) {
      continue;
    }
    const resolved = resolveItemPath(item.source, context);
    if (item.type === "directory") {
      await ensureDir(resolved);
      continue;
    }
    await ensureDir(path.dirname(resolved));
  }
}

export interface InitOptions {
  blueprint?: LinkBlueprint;
  conflictPolicy?: ConflictPolicy;
}

export async function initBlueprint(
  context: LinkContext,
  options: InitOptions = {}
): Promise<{ action: "created" | "overwritten" | "skipped"; blueprintPath: string }> {
  const blueprintPath = path.join(context.projectRoot, BLUEPRINT_FILE);
  const exists = await fileExists(blueprintPath);
  const blueprint = options.blueprint ?? createDefaultBlueprint();
  const policy = options.conflictPolicy ?? null;

  if (exists) {
    if (!policy) {
      throw new AicliLinkError(
        `Blueprint already exists: ${blueprintPath}`,
        ErrorKinds.TargetConflict
      );
    }
    if (policy === "skip") {
      return { action: "skipped", blueprintPath };
    }
    if (policy === "backup") {
      await createBackup(blueprintPath, context);
    }
  }

  await writeBlueprint(context.projectRoot, blueprint);
  await ensureSourceDirectories(blueprint, context);

  return { action: exists ? "overwritten" : "created", blueprintPath };
}
