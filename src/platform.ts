import fs from "fs/promises";
import os from "os";
import path from "path";
import { isErrnoException } from "./errors";
import { fileExists } from "./filesystem";
import type { LinkContext, LinkItemType, LinkKind, OsFamily, PlatformInfo } from "./types";

export const KERNEL_VERSION_PATH = "/proc/version";
export const WSL_ENV_VAR = "WSL_DISTRO_NAME";
export const WINDOWS_MOUNT_PATH = "/mnt/c";

export const LINK_KIND_PREFERENCE: readonly LinkKind[] = ["symlink", "hardlink", "copy"];

export interface DetectOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  kernelVersionPath?: string;
  windowsMountPath?: string;
}

function toOsFamily(platform: NodeJS.Platform): OsFamily {
  switch (platform) {
    case "linux":
      return "linux";
    case "darwin":
      return "macos";
    case "win32":
      return "windows";
    default:
      return "other";
  }
}

async function kernelMentionsMicrosoft(markerPath: string): Promise<boolean> {
  try {
    const contents = await fs.readFile(markerPath, "utf8");
    return contents.toLowerCase().includes("microsoft");
  } catch (error) {
    if (isErrnoException(error)) {
      return false;
    }
    throw error;
  }
}

async function mountPointExists(mountPath: string): Promise<boolean> {
  try {
    await fs.stat(mountPath);
    return true;
  } catch (error) {
    if (isErrnoException(error)) {
      return false;
    }
    throw error;
  }
}

export async function detectWsl(options: DetectOptions = {}): Promise<boolean> {
  const platform = options.platform ?? process.platform;
  if (platform === "win32") {
    return false;
  }
  if (await kernelMentionsMicrosoft(options.kernelVersionPath ?? KERNEL_VERSION_PATH)) {
    return true;
  }
  const env = options.env ?? process.env;
  const distro = env[WSL_ENV_VAR];
  if (distro !== undefined && distro.length > 0) {
    return true;
  }
  return await mountPointExists(options.windowsMountPath ?? WINDOWS_MOUNT_PATH);
}

/** Describes the host. Options override what would be read from the process. */
export async function detectPlatform(options: DetectOptions = {}): Promise<PlatformInfo> {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const family = toOsFamily(platform);
  const isWsl = await detectWsl({ ...options, platform, env });
  const nativeWindows = family === "windows" && !isWsl;

  let appDataDir: string | null = null;
  if (nativeWindows) {
    const appData = env.APPDATA;
    appDataDir =
      appData !== undefined && appData.length > 0
        ? appData
        : path.join(homeDir, "AppData", "Roaming");
  }

  return {
    os: family,
    isWsl,
    supportsSymlinks: !nativeWindows,
    homeDir,
    appDataDir
  };
}

async function canCreateLink(
  scratch: string,
  kind: "symlink" | "hardlink"
): Promise<boolean> {
  const source = path.join(scratch, `${kind}-source`);
  const target = path.join(scratch, `${kind}-target`);
  try {
    await fs.writeFile(source, "test", "utf8");
    if (kind === "symlink") {
      await fs.symlink(source, target);
    } else {
      await fs.link(source, target);
    }
    return true;
  } catch (_error) {
    return false;
  } finally {
    await fs.rm(target, { force: true });
    await fs.rm(source, { force: true });
  }
}

/** Probes in `workingDir`, or in the system temp directory when it does not exist. */
export async function probeLinkCapabilities(workingDir: string): Promise<Set<LinkKind>> {
  const base = (await fileExists(workingDir)) ? workingDir : os.tmpdir();
  const scratch = await fs.mkdtemp(path.join(base, ".aicli-probe-"));
  const supported = new Set<LinkKind>();
  try {
    if (await canCreateLink(scratch, "symlink")) {
      supported.add("symlink");
    }
    if (await canCreateLink(scratch, "hardlink")) {
      supported.add("hardlink");
    }
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
  }
  supported.add("copy");
  return supported;
}

function isUsable(kind: LinkKind, capabilities: ReadonlySet<LinkKind>, platform: PlatformInfo): boolean {
  if (kind === "copy") {
    return true;
  }
  if (kind === "symlink" && !platform.supportsSymlinks) {
    return false;
  }
  return capabilities.has(kind);
}

export interface LinkKindSelection {
  kind: LinkKind;
  warnings: string[];
}

export function selectLinkKind(
  capabilities: ReadonlySet<LinkKind>,
  platform: PlatformInfo,
  pinned?: LinkKind
): LinkKindSelection {
  const warnings: string[] = [];
  if (pinned) {
    if (isUsable(pinned, capabilities, platform)) {
      return { kind: pinned, warnings };
    }
    const fallback = bestLinkKind(capabilities, platform);
    warnings.push(`${pinned} is not supported here; falling back to ${fallback}`);
    return { kind: fallback, warnings };
  }
  return { kind: bestLinkKind(capabilities, platform), warnings };
}

function bestLinkKind(capabilities: ReadonlySet<LinkKind>, platform: PlatformInfo): LinkKind {
  return LINK_KIND_PREFERENCE.find((kind) => isUsable(kind, capabilities, platform)) ?? "copy";
}

// Hard links cannot point at directories.
export function linkKindForItem(
  kind: LinkKind,
  itemType: LinkItemType,
  capabilities: ReadonlySet<LinkKind>,
  platform: PlatformInfo
): LinkKind {
  if (kind !== "hardlink" || itemType === "file") {
    return kind;
  }
  return isUsable("symlink", capabilities, platform) ? "symlink" : "copy";
}

export function createLinkContext(
  projectRoot: string,
  platform: PlatformInfo,
  now: () => Date = () => new Date()
): LinkContext {
  return Object.freeze({
    platform: Object.freeze({ ...platform }),
    projectRoot: path.resolve(projectRoot),
    now
  });
}
