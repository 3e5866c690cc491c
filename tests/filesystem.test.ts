import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { copyFileOrDir, hardLinkOrCopy, isEmptyDir, treeEquals } from "../src/filesystem";
import type { HardLinkFn } from "../src/filesystem";
import { createTempDir, writeFile } from "./helpers";

function failingLink(code: string): HardLinkFn {
  return () => Promise.reject(Object.assign(new Error(`${code}: link failed`), { code }));
}

void test("treeEquals compares names and bytes at every level", async () => {
  const temp = await createTempDir();
  const left = path.join(temp, "left");
  const right = path.join(temp, "right");
  await writeFile(path.join(left, "a.md"), "A");
  await writeFile(path.join(left, "nested", "b.md"), "B");
  await copyFileOrDir(left, right);

  assert.equal(await treeEquals(left, right), true);

  await fs.writeFile(path.join(right, "nested", "b.md"), "C", "utf8");
  assert.equal(await treeEquals(left, right), false);

  await fs.writeFile(path.join(right, "nested", "b.md"), "B", "utf8");
  await writeFile(path.join(right, "extra.md"), "");
  assert.equal(await treeEquals(left, right), false);
});

void test("treeEquals does not match a file against a directory or a missing path", async () => {
  const temp = await createTempDir();
  await writeFile(path.join(temp, "file"), "x");
  await fs.mkdir(path.join(temp, "dir"));

  assert.equal(await treeEquals(path.join(temp, "file"), path.join(temp, "dir")), false);
  assert.equal(await treeEquals(path.join(temp, "file"), path.join(temp, "missing")), false);
});

void test("isEmptyDir is true only for a directory without entries", async () => {
  const temp = await createTempDir();
  await fs.mkdir(path.join(temp, "empty"));
  await writeFile(path.join(temp, "full", "a.md"), "a");

  assert.equal(await isEmptyDir(path.join(temp, "empty")), true);
  assert.equal(await isEmptyDir(path.join(temp, "full")), false);
  assert.equal(await isEmptyDir(path.join(temp, "full", "a.md")), false);
  assert.equal(await isEmptyDir(path.join(temp, "missing")), false);
});

void test("hardLinkOrCopy shares the inode when linking works", async () => {
  const temp = await createTempDir();
  const source = path.join(temp, "source.md");
  const target = path.join(temp, "target.md");
  await writeFile(source, "shared");

  assert.equal(await hardLinkOrCopy(source, target), "hardlink");
  assert.equal((await fs.stat(target)).ino, (await fs.stat(source)).ino);
});

void test("hardLinkOrCopy copies across devices", async () => {
  const temp = await createTempDir();
  const source = path.join(temp, "source.md");
  const target = path.join(temp, "target.md");
  await writeFile(source, "shared");

  const kind = await hardLinkOrCopy(source, target, failingLink("EXDEV"));

  assert.equal(kind, "copy");
  assert.equal(await fs.readFile(target, "utf8"), "shared");
  assert.notEqual((await fs.stat(target)).ino, (await fs.stat(source)).ino);
});

void test("hardLinkOrCopy rethrows other link errors", async () => {
  const temp = await createTempDir();
  const source = path.join(temp, "source.md");
  await writeFile(source, "shared");

  await assert.rejects(hardLinkOrCopy(source, path.join(temp, "target.md"), failingLink("EPERM")), {
    code: "EPERM"
  });
  await assert.rejects(fs.access(path.join(temp, "target.md")));
});
