import fs from "fs/promises";
import path from "path";
import { isErrnoException } from "./errors";
import { copyFileOrDir, ensureDir, fileExists, removePath } from "./filesystem";
import type { LinkContext } from "./types";

export const BACKUP_DIR = ".aicli-backup";

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local time in ISO 8601 basic format, e.g. `20260102T030405`. */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `T${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function getBackupDir(target: string): string {
  return path.join(path.dirname(target), BACKUP_DIR);
}

function backupPrefix(target: string): string {
  return `${path.basename(target)}.backup_`;
}

interface BackupName {
  file: string;
  stamp: string;
  counter: number;
}

function parseBackupName(file: string, prefix: string): BackupName | null {
  if (!file.startsWith(prefix)) {
    return null;
  }
  const match = /^(\d{8}T\d{6})(?:-(\d+))?$/.exec(file.slice(prefix.length));
  if (!match) {
    return null;
  }
  return { file, stamp: match[1], counter: match[2] ? Number.parseInt(match[2], 10) : 0 };
}

function compareBackups(a: BackupName, b: BackupName): number {
  if (a.stamp !== b.stamp) {
    return a.stamp < b.stamp ? -1 : 1;
  }
  return a.counter - b.counter;
}

export async function listBackups(target: string): Promise<string[]> {
  const backupDir = getBackupDir(target);
  let entries: string[];
  try {
    entries = await fs.readdir(backupDir);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
  const prefix = backupPrefix(target);
  return entries
    .map((entry) => parseBackupName(entry, prefix))
    .filter((entry): entry is BackupName => entry !== null)
    .sort(compareBackups)
    .map((entry) => path.join(backupDir, entry.file));
}

/**
 * Copies `target` into `<dir>/.aicli-backup/<name>.backup_<timestamp>`. A
 * second backup within the same second gets a `-1`, `-2`... suffix. The
 * original is left in place.
 */
export async function createBackup(target: string, context: LinkContext): Promise<string> {
  const backupDir = getBackupDir(target);
  await ensureDir(backupDir);
  const base = path.join(backupDir, `${backupPrefix(target)}${formatBackupTimestamp(context.now())}`);
  let destination = base;
  let counter = 0;
  while (await fileExists(destination)) {
    counter += 1;
    destination = `${base}-${counter}`;
  }
  await copyFileOrDir(target, destination);
  return destination;
}

export async function restoreBackup(target: string): Promise<boolean> {
  const backups = await listBackups(target);
  const latest = backups[backups.length - 1];
  if (latest === undefined) {
    return false;
  }
  if (await fileExists(target)) {
    await removePath(target);
  }
  await fs.rename(latest, target);
  return true;
}
