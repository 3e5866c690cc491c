import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import {
  createBackup,
  formatBackupTimestamp,
  getBackupDir,
  listBackups,
  restoreBackup
} from "../src/backup";
import { createFixture, writeFile } from "./helpers";

void test("formatBackupTimestamp uses the ISO basic format", () => {
  assert.equal(formatBackupTimestamp(new Date(2026, 0, 2, 3, 4, 5)), "20260102T030405");
  assert.equal(formatBackupTimestamp(new Date(2026, 10, 21, 22, 59, 9)), "20261121T225909");
});

void test("createBackup copies a file next to it and keeps the original", async () => {
  const { homeDir, context } = await createFixture();
  const target = path.join(homeDir, "notes.md");
  await writeFile(target, "original");

  const backupPath = await createBackup(target, context);

  assert.equal(
    backupPath,
    path.join(homeDir, ".aicli-backup", "notes.md.backup_20260102T030405")
  );
  assert.equal(await fs.readFile(backupPath, "utf8"), "original");
  assert.equal(await fs.readFile(target, "utf8"), "original");
  assert.equal(getBackupDir(target), path.join(homeDir, ".aicli-backup"));
});

void test("createBackup adds a counter when the timestamp is taken", async () => {
  const { homeDir, context } = await createFixture();
  const target = path.join(homeDir, "notes.md");
  await writeFile(target, "first");
  const first = await createBackup(target, context);
  await fs.writeFile(target, "second", "utf8");

  const second = await createBackup(target, context);

  assert.equal(second, `${first}-1`);
  assert.equal(await fs.readFile(second, "utf8"), "second");
  assert.deepStrictEqual(await listBackups(target), [first, second]);
});

void test("createBackup copies directories recursively", async () => {
  const { homeDir, context } = await createFixture();
  const target = path.join(homeDir, "commands");
  await writeFile(path.join(target, "nested", "review.md"), "review");

  const backupPath = await createBackup(target, context);

  assert.equal(
    await fs.readFile(path.join(backupPath, "nested", "review.md"), "utf8"),
    "review"
  );
});

void test("listBackups ignores other files in the backup directory", async () => {
  const { homeDir, context } = await createFixture();
  const target = path.join(homeDir, "notes.md");
  await writeFile(target, "notes");
  await writeFile(path.join(homeDir, ".aicli-backup", "other.md.backup_20260102T030405"), "x");
  await writeFile(path.join(homeDir, ".aicli-backup", "notes.md.backup_latest"), "x");

  const backupPath = await createBackup(target, context);

  assert.deepStrictEqual(await listBackups(target), [backupPath]);
});

void test("restoreBackup moves the most recent backup over the target", async () => {
  let now = new Date(2026, 0, 2, 3, 4, 5);
  const { homeDir, context } = await createFixture(() => now);
  const target = path.join(homeDir, "notes.md");
  await writeFile(target, "older");
  const older = await createBackup(target, context);
  now = new Date(2026, 0, 3, 3, 4, 5);
  await fs.writeFile(target, "newer", "utf8");
  await createBackup(target, context);
  await fs.writeFile(target, "current", "utf8");

  const restored = await restoreBackup(target);

  assert.equal(restored, true);
  assert.equal(await fs.readFile(target, "utf8"), "newer");
  assert.deepStrictEqual(await listBackups(target), [older]);
});

void test("restoreBackup recreates a missing target", async () => {
  const { homeDir, context } = await createFixture();
  const target = path.join(homeDir, "notes.md");
  await writeFile(target, "saved");
  await createBackup(target, context);
  await fs.rm(target);

  assert.equal(await restoreBackup(target), true);
  assert.equal(await fs.readFile(target, "utf8"), "saved");
});

void test("restoreBackup returns false without a backup", async () => {
  const { homeDir } = await createFixture();
  const target = path.join(homeDir, "notes.md");
  await writeFile(target, "kept");

  assert.equal(await restoreBackup(target), false);
  assert.equal(await fs.readFile(target, "utf8"), "kept");
});
