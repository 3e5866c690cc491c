import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createLinkContext } from "../src/platform";
import type { LinkContext, LinkItem, LinkKind, PlatformInfo } from "../src/types";

export const ALL_LINK_KINDS: ReadonlySet<LinkKind> = new Set<LinkKind>(["symlink", "hardlink", "copy"]);

export const FIXED_NOW = new Date(2026, 0, 2, 3, 4, 5);

export async function createTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "aicli-link-"));
}

export async function writeFile(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}

export function linuxPlatform(homeDir: string): PlatformInfo {
  return { os: "linux", isWsl: false, supportsSymlinks: true, homeDir, appDataDir: null };
}

export interface Fixture {
  temp: string;
  projectRoot: string;
  homeDir: string;
  context: LinkContext;
}

export async function createFixture(now: () => Date = () => FIXED_NOW): Promise<Fixture> {
  const temp = await createTempDir();
  const projectRoot = path.join(temp, "project");
  const homeDir = path.join(temp, "home");
  await fs.mkdir(projectRoot, { recursive: true });
  await fs.mkdir(homeDir, { recursive: true });
  return {
    temp,
    projectRoot,
    homeDir,
    context: createLinkContext(projectRoot, linuxPlatform(homeDir), now)
  };
}

export function fileItem(overrides: Partial<LinkItem> & Pick<LinkItem, "id">): LinkItem {
  return {
    name: overrides.id,
    type: "file",
    source: `${overrides.id}.md`,
    target: `~/${overrides.id}.md`,
    createIfMissing: false,
    defaultContent: null,
    ...overrides
  };
}
