#!/usr/bin/env node
import path from "path";
import { readBlueprint } from "./blueprint";
import { AicliLinkError, ErrorKinds, ExitCodes } from "./errors";
import { detectToolConfigs, importToolConfigs } from "./importer";
import { initBlueprint } from "./init";
import { expandHome } from "./paths";
import { createLinkContext, detectPlatform, probeLinkCapabilities, selectLinkKind } from "./platform";
import { reconcileBlueprint } from "./reconcile";
import {
  createBlueprintRegistry,
  createLegacyRegistry,
  getRegistryStatus,
  repairRegistry,
  validateRegistry
} from "./registry";
import type { ConfigRegistry } from "./registry";
import { TOOL_IDS, isToolId } from "./tools";
import type { ToolId } from "./tools";
import { unlinkBlueprint } from "./unlink";
import type { ConflictPolicy, LinkContext, LinkKind, ReconcileDecision } from "./types";

const COMMANDS = [
  "init",
  "setup",
  "unlink",
  "status",
  "validate",
  "repair",
  "probe",
  "detect",
  "import"
] as const;
type Command = (typeof COMMANDS)[number];

const PROJECT_ROOT_ENV = "AICLI_PROJECT_ROOT";

interface ParsedArgs {
  command: Command | null;
  project?: string;
  dryRun: boolean;
  conflictPolicy?: ConflictPolicy;
  linkKind?: LinkKind;
  skipAll: boolean;
  restore: boolean;
  legacy: boolean;
  tools: ToolId[];
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    command: null,
    dryRun: false,
    skipAll: false,
    restore: true,
    legacy: false,
    tools: [],
    help: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!result.command && !arg.startsWith("-")) {
      if (!isCommand(arg)) {
        throw new AicliLinkError(`Unknown command: ${arg}`, ErrorKinds.Usage);
      }
      result.command = arg;
      continue;
    }
    if (arg === "--project") {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("-")) {
        throw new AicliLinkError("--project expects a path", ErrorKinds.Usage);
      }
      result.project = value;
      i += 1;
      continue;
    }
    if (arg === "--dry-run") {
      result.dryRun = true;
      continue;
    }
    if (arg === "--on-conflict") {
      const value = args[i + 1];
      if (value !== "backup" && value !== "overwrite" && value !== "skip") {
        throw new AicliLinkError(
          `--on-conflict expects backup, overwrite or skip (got ${String(value)})`,
          ErrorKinds.Usage
        );
      }
      result.conflictPolicy = value;
      i += 1;
      continue;
    }
    if (arg === "--link-kind") {
      const value = args[i + 1];
      if (value !== "symlink" && value !== "hardlink" && value !== "copy") {
        throw new AicliLinkError(
          `--link-kind expects symlink, hardlink or copy (got ${String(value)})`,
          ErrorKinds.Usage
        );
      }
      result.linkKind = value;
      i += 1;
      continue;
    }
    if (arg === "--skip-all") {
      result.skipAll = true;
      continue;
    }
    if (arg === "--no-restore") {
      result.restore = false;
      continue;
    }
    if (arg === "--legacy") {
      result.legacy = true;
      continue;
    }
    if (arg === "--tool") {
      const value = args[i + 1];
      if (value === undefined || !isToolId(value)) {
        throw new AicliLinkError(
          `--tool expects one of ${TOOL_IDS.join(", ")} (got ${String(value)})`,
          ErrorKinds.Usage
        );
      }
      result.tools.push(value);
      i += 1;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
    throw new AicliLinkError(`Unknown option: ${arg}`, ErrorKinds.Usage);
  }

  return result;
}

function printHelp(): void {
  const lines = [
    "aicli-link <command> [options]",
    "",
    "Commands:",
    "  init        Write a default aicli-links.json blueprint",
    "  setup       Link every blueprint item into place",
    "  unlink      Remove links and restore the latest backups",
    "  status      Show source/target state per entry",
    "  validate    Check that every entry is linked and in sync",
    "  repair      Relink entries whose link is broken",
    "  probe       Show platform and supported link kinds",
    "  detect      List the per-user tool files that exist",
    "  import      Copy existing per-user tool files into the project",
    "",
    "Options:",
    `  --project <path>        Project root (default: $${PROJECT_ROOT_ENV} or cwd)`,
    "  --dry-run               Report decisions without touching the filesystem",
    "  --on-conflict <policy>  backup | overwrite | skip (default: backup)",
    "  --link-kind <kind>      symlink | hardlink | copy (default: best available)",
    "  --skip-all              Mark every item skipped without touching anything",
    "  --no-restore            unlink: do not restore backups",
    "  --legacy                status/validate/repair: use the built-in tool mapping",
    `  --tool <tool>           detect/import: ${TOOL_IDS.join(" | ")} (repeatable)`,
    "  -h, --help              Show help"
  ];
  console.log(lines.join("\n"));
}

function describeDecision(decision: ReconcileDecision): string {
  switch (decision.type) {
    case "skip":
      return `skip (${decision.reason})`;
    case "create-source":
      return `create ${decision.itemType} ${decision.path}`;
    case "already-linked":
      return `already linked ${decision.target}`;
    case "backup-target":
      return `back up ${decision.target}`;
    case "remove-target":
      return `remove ${decision.target}`;
    case "create-link":
      return `${decision.kind} ${decision.target} -> ${decision.source}`;
  }
}

async function loadRegistry(context: LinkContext, legacy: boolean): Promise<ConfigRegistry> {
  if (legacy) {
    return createLegacyRegistry(context);
  }
  return createBlueprintRegistry(await readBlueprint(context.projectRoot), context);
}

function toolsOf(args: ParsedArgs): readonly ToolId[] {
  return args.tools.length > 0 ? args.tools : TOOL_IDS;
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.help || !args.command) {
    printHelp();
    return;
  }

  const platform = await detectPlatform();
  const rawRoot = args.project ?? process.env[PROJECT_ROOT_ENV] ?? process.cwd();
  const context = createLinkContext(path.resolve(expandHome(rawRoot, platform.homeDir)), platform);

  switch (args.command) {
    case "init": {
      const result = await initBlueprint(context, { conflictPolicy: args.conflictPolicy });
      console.log(`${result.action}: ${result.blueprintPath}`);
      return;
    }
    case "setup": {
      const blueprint = await readBlueprint(context.projectRoot);
      const capabilities = await probeLinkCapabilities(context.projectRoot);
      const report = await reconcileBlueprint({
        blueprint,
        context,
        capabilities,
        dryRun: args.dryRun,
        conflictPolicy: args.conflictPolicy,
        linkKind: args.linkKind,
        skipAll: args.skipAll
      });
      report.warnings.forEach((warning) => console.warn(warning));
      const prefix = report.dryRun ? "[dry-run] " : "";
      report.outcomes.forEach((outcome, index) => {
        console.log(`${prefix}[${index + 1}/${report.outcomes.length}] ${outcome.id}: ${outcome.action}`);
        outcome.decisions.forEach((decision) => console.log(`  ${describeDecision(decision)}`));
        if (outcome.backupPath) {
          console.log(`  backup: ${outcome.backupPath}`);
        }
        if (outcome.reason) {
          console.log(`  ${outcome.reason.message}`);
        }
        if (outcome.error) {
          console.error(`  ${outcome.error.kind}: ${outcome.error.message}`);
        }
      });
      const { counts } = report;
      console.log(`Created: ${counts.created}`);
      console.log(`Linked: ${counts.linked}`);
      console.log(`Already linked: ${counts.alreadyLinked}`);
      console.log(`Skipped: ${counts.skipped}`);
      console.log(`Errors: ${counts.errored}`);
      if (counts.errored > 0) {
        process.exitCode = ExitCodes.Filesystem;
      }
      return;
    }
    case "unlink": {
      const blueprint = await readBlueprint(context.projectRoot);
      const report = await unlinkBlueprint({
        blueprint,
        context,
        dryRun: args.dryRun,
        restoreBackup: args.restore
      });
      const prefix = report.dryRun ? "[dry-run] " : "";
      report.outcomes.forEach((outcome) => {
        const suffix = outcome.message ? ` (${outcome.message})` : "";
        console.log(`${prefix}${outcome.action}: ${outcome.id}${suffix}`);
      });
      if (report.errors.length > 0) {
        process.exitCode = ExitCodes.Filesystem;
      }
      return;
    }
    case "status": {
      const registry = await loadRegistry(context, args.legacy);
      const statuses = await getRegistryStatus(registry);
      let unhealthy = false;
      for (const [id, status] of Object.entries(statuses)) {
        console.log(
          `${status.state}: ${id} (source ${status.sourceExists ? "present" : "missing"}, ` +
            `target ${status.targetKind}${status.resolvesCorrectly ? ", resolves to source" : ""})`
        );
        unhealthy = unhealthy || status.state !== "linked";
      }
      if (unhealthy) {
        process.exitCode = ExitCodes.Validation;
      }
      return;
    }
    case "validate": {
      const registry = await loadRegistry(context, args.legacy);
      const results = await validateRegistry(registry);
      const failed = Object.entries(results).filter(([, ok]) => !ok);
      Object.entries(results).forEach(([id, ok]) => console.log(`${ok ? "ok" : "invalid"}: ${id}`));
      if (failed.length > 0) {
        process.exitCode = ExitCodes.Validation;
      }
      return;
    }
    case "repair": {
      const registry = await loadRegistry(context, args.legacy);
      const capabilities = await probeLinkCapabilities(context.projectRoot);
      const result = await repairRegistry(registry, capabilities, args.linkKind);
      result.repaired.forEach((id) => console.log(`repaired: ${id}`));
      result.failures.forEach((failure) => console.warn(`not repaired: ${failure.id} (${failure.message})`));
      console.log(`Repaired: ${result.repaired.length}`);
      return;
    }
    case "probe": {
      const capabilities = await probeLinkCapabilities(context.projectRoot);
      const selection = selectLinkKind(capabilities, platform, args.linkKind);
      selection.warnings.forEach((warning) => console.warn(warning));
      console.log(`OS: ${platform.os}${platform.isWsl ? " (WSL)" : ""}`);
      console.log(`Home: ${platform.homeDir}`);
      console.log(`Symlinks allowed: ${platform.supportsSymlinks ? "yes" : "no"}`);
      console.log(`Supported link kinds: ${Array.from(capabilities).join(", ")}`);
      console.log(`Selected link kind: ${selection.kind}`);
      return;
    }
    case "detect": {
      const detected = await detectToolConfigs(context, toolsOf(args));
      detected.forEach((file) =>
        console.log(`${file.found ? "found" : "missing"}: ${file.id} (${file.systemPath})`)
      );
      return;
    }
    case "import": {
      const report = await importToolConfigs(context, toolsOf(args), {
        conflictPolicy: args.conflictPolicy
      });
      if (report.outcomes.length === 0) {
        console.log("Nothing to import");
      }
      report.outcomes.forEach((outcome) => {
        const detail = outcome.message ? ` (${outcome.message})` : "";
        console.log(`${outcome.action}: ${outcome.id} -> ${outcome.projectFile}${detail}`);
        if (outcome.backupPath) {
          console.log(`  backup: ${outcome.backupPath}`);
        }
      });
      if (report.errors.length > 0) {
        process.exitCode = ExitCodes.Filesystem;
      }
      return;
    }
  }
}

run().catch((error: unknown) => {
  if (error instanceof AicliLinkError) {
    console.error(error.message);
    process.exit(error.code);
  }
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error("Unexpected error");
  }
  process.exit(ExitCodes.Failure);
});
