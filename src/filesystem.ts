import type { Stats } from "fs";
import fs from "fs/promises";
import path from "path";
import { isErrnoException } from "./errors";

export async function ensureDir(target: string): Promise<void> {
  await fs.mkdir(target, { recursive: true });
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.lstat(target);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}

export async function readLinkTarget(target: string): Promise<string | null> {
  try {
    return await fs.readlink(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EINVAL")) {
      return null;
    }
    throw error;
  }
}

export async function realPathOrNull(target: string): Promise<string | null> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}

// Symlinks are copied as links, never followed.
export async function copyFileOrDir(source: string, target: string): Promise<void> {
  const stat = await fs.lstat(source);
  if (stat.isSymbolicLink()) {
    await ensureDir(path.dirname(target));
    await fs.symlink(await fs.readlink(source), target);
    return;
  }
  if (stat.isDirectory()) {
    await ensureDir(target);
    const entries = await fs.readdir(source);
    for (const entry of entries) {
      await copyFileOrDir(path.join(source, entry), path.join(target, entry));
    }
    return;
  }
  await ensureDir(path.dirname(target));
  await fs.copyFile(source, target);
}

export async function removePath(target: string): Promise<void> {
  const stat = await fs.lstat(target);
  if (stat.isDirectory()) {
    await fs.rm(target, { recursive: true, force: true });
    return;
  }
  await fs.unlink(target);
}

export async function contentEquals(target: string, expected: Buffer): Promise<boolean> {
  const actual = await fs.readFile(target);
  return actual.equals(expected);
}

/**
 * Compares two paths recursively without following symlinks: the same entry
 * names at every level, byte-equal files and equal link targets.
 */
export async function treeEquals(left: string, right: string): Promise<boolean> {
  const leftStat = await lstatOrNull(left);
  const rightStat = await lstatOrNull(right);
  if (!leftStat || !rightStat) {
    return false;
  }
  if (leftStat.isSymbolicLink() || rightStat.isSymbolicLink()) {
    return (
      leftStat.isSymbolicLink() &&
      rightStat.isSymbolicLink() &&
      (await fs.readlink(left)) === (await fs.readlink(right))
    );
  }
  if (leftStat.isDirectory() || rightStat.isDirectory()) {
    if (!leftStat.isDirectory() || !rightStat.isDirectory()) {
      return false;
    }
    const leftEntries = (await fs.readdir(left)).sort();
    const rightEntries = (await fs.readdir(right)).sort();
    if (leftEntries.join("\0") !== rightEntries.join("\0")) {
      return false;
    }
    for (const entry of leftEntries) {
      if (!(await treeEquals(path.join(left, entry), path.join(right, entry)))) {
        return false;
      }
    }
    return true;
  }
  if (leftStat.size !== rightStat.size) {
    return false;
  }
  return await contentEquals(right, await fs.readFile(left));
}

export async function isEmptyDir(target: string): Promise<boolean> {
  const stat = await lstatOrNull(target);
  if (!stat?.isDirectory()) {
    return false;
  }
  return (await fs.readdir(target)).length === 0;
}

export type HardLinkFn = (source: string, target: string) => Promise<void>;

/**
 * Hard links `target` to `source`, copying instead when the two live on
 * different devices. Returns the kind that was actually used.
 */
export async function hardLinkOrCopy(
  source: string,
  target: string,
  link: HardLinkFn = fs.link
): Promise<"hardlink" | "copy"> {
  try {
    await link(source, target);
    return "hardlink";
  } catch (error) {
    if (isErrnoException(error) && error.code === "EXDEV") {
      await copyFileOrDir(source, target);
      return "copy";
    }
    throw error;
  }
}
