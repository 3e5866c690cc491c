import { listBackups, restoreBackup } from "./backup";
import { formatError } from "./errors";
import { removePath, treeEquals } from "./filesystem";
import { resolveItemPath } from "./paths";
import { inspectTarget, linkStateOf } from "./reconcile";
import type { TargetInfo } from "./reconcile";
import type { LinkBlueprint, LinkContext, UnlinkOutcome, UnlinkReport } from "./types";

export interface UnlinkOptions {
  blueprint: LinkBlueprint;
  context: LinkContext;
  dryRun?: boolean;
  restoreBackup?: boolean;
}

// Only remove what reconciliation could have put there.
async function isOwnedBySource(info: TargetInfo, source: string, target: string): Promise<boolean> {
  if (info.isSymlink || info.sameInode) {
    return true;
  }
  return await treeEquals(source, target);
}

export async function unlinkBlueprint(options: UnlinkOptions): Promise<UnlinkReport> {
  const { blueprint, context } = options;
  const dryRun = options.dryRun ?? false;
  const restore = options.restoreBackup ?? true;
  const outcomes: UnlinkOutcome[] = [];

  for (const item of blueprint.links) {
    const source = resolveItemPath(item.source, context);
    const target = resolveItemPath(item.target, context);
    const outcome: UnlinkOutcome = { id: item.id, target, state: "unlinked", action: "skipped" };
    try {
      const info = await inspectTarget(source, target);
      outcome.state = linkStateOf(info);
      if (outcome.state !== "linked") {
        outcome.message = `Not linked (${outcome.state}): ${target}`;
        outcomes.push(outcome);
        continue;
      }
      if (!(await isOwnedBySource(info, source, target))) {
        outcome.message = `Not a link or copy of ${source}: ${target}`;
        outcomes.push(outcome);
        continue;
      }

      if (!dryRun) {
        await removePath(target);
      }
      outcome.action = "unlinked";

      if (restore) {
        const restored = dryRun
          ? (await listBackups(target)).length > 0
          : await restoreBackup(target);
        if (restored) {
          outcome.action = "restored";
        }
      }
    } catch (error) {
      outcome.action = "error";
      outcome.message = formatError(error);
    }
    outcomes.push(outcome);
  }

  return {
    dryRun,
    outcomes,
    errors: outcomes.flatMap((outcome) =>
      outcome.action === "error" ? [{ id: outcome.id, message: outcome.message ?? "" }] : []
    )
  };
}
