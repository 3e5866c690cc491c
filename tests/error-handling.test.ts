import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { readBlueprint, readBlueprintFile } from "../src/blueprint";
import { AicliLinkError, ErrorKinds, ExitCodes, formatError } from "../src/errors";
import { createFixture, writeFile } from "./helpers";

void test("readBlueprint throws BlueprintNotFound when no blueprint exists", async () => {
  const { projectRoot } = await createFixture();
  await assert.rejects(readBlueprint(projectRoot), (error) => {
    assert.ok(error instanceof AicliLinkError);
    assert.equal(error.kind, ErrorKinds.BlueprintNotFound);
    assert.equal(error.code, ExitCodes.Validation);
    assert.equal(
      error.message,
      `Blueprint not found in ${projectRoot} (expected aicli-links.json); run "aicli-link init" first`
    );
    return true;
  });
});

void test("readBlueprintFile names the missing path", async () => {
  const { projectRoot } = await createFixture();
  const blueprintPath = path.join(projectRoot, "other.json");
  await assert.rejects(readBlueprintFile(blueprintPath), (error) => {
    assert.ok(error instanceof AicliLinkError);
    assert.equal(error.message, `Blueprint not found: ${blueprintPath}`);
    return true;
  });
});

void test("readBlueprint includes details for a blueprint that does not parse", async () => {
  const { projectRoot } = await createFixture();
  await writeFile(path.join(projectRoot, "aicli-links.json"), '{"version": "1", "links": [');
  await assert.rejects(readBlueprint(projectRoot), (error) => {
    assert.ok(error instanceof AicliLinkError);
    assert.equal(error.kind, ErrorKinds.BlueprintMalformed);
    assert.equal(error.code, ExitCodes.Validation);
    assert.match(error.message, /^Invalid blueprint in /);
    return true;
  });
});

void test("readBlueprint rejects an unknown item type", async () => {
  const { projectRoot } = await createFixture();
  const blueprintPath = path.join(projectRoot, "aicli-links.json");
  await writeFile(
    blueprintPath,
    JSON.stringify({
      version: "1",
      links: [{ id: "a", name: "A", type: "socket", source: "a", target: "~/a" }]
    })
  );
  await assert.rejects(readBlueprint(projectRoot), (error) => {
    assert.ok(error instanceof AicliLinkError);
    assert.equal(
      error.message,
      `Invalid blueprint in ${blueprintPath}: links[0].type must be "file" or "directory"`
    );
    return true;
  });
});

void test("readBlueprint rejects empty required fields", async () => {
  const { projectRoot } = await createFixture();
  const blueprintPath = path.join(projectRoot, "aicli-links.json");
  await writeFile(
    blueprintPath,
    JSON.stringify({
      version: "1",
      links: [{ id: "a", name: "A", type: "file", source: "", target: "~/a" }]
    })
  );
  await assert.rejects(readBlueprint(projectRoot), (error) => {
    assert.ok(error instanceof AicliLinkError);
    assert.equal(
      error.message,
      `Invalid blueprint in ${blueprintPath}: links[0].source must be a non-empty string`
    );
    return true;
  });
});

void test("readBlueprint rejects duplicate ids", async () => {
  const { projectRoot } = await createFixture();
  const blueprintPath = path.join(projectRoot, "aicli-links.json");
  const item = { id: "dup", name: "Dup", type: "file", source: "a", target: "~/a" };
  await writeFile(blueprintPath, JSON.stringify({ version: "1", links: [item, item] }));
  await assert.rejects(readBlueprint(projectRoot), (error) => {
    assert.ok(error instanceof AicliLinkError);
    assert.equal(error.message, `Invalid blueprint in ${blueprintPath}: duplicate link id "dup"`);
    return true;
  });
});

void test("readBlueprint rejects a document that is not an object", async () => {
  const { projectRoot } = await createFixture();
  const blueprintPath = path.join(projectRoot, "aicli-links.json");
  await writeFile(blueprintPath, '"just a string"');
  await assert.rejects(readBlueprint(projectRoot), (error) => {
    assert.ok(error instanceof AicliLinkError);
    assert.equal(error.message, `Invalid blueprint in ${blueprintPath}: expected an object`);
    return true;
  });
});

void test("error kinds map to exit codes", () => {
  assert.equal(new AicliLinkError("x", ErrorKinds.Usage).code, ExitCodes.Usage);
  assert.equal(new AicliLinkError("x", ErrorKinds.TargetConflict).code, ExitCodes.Conflict);
  assert.equal(new AicliLinkError("x", ErrorKinds.SourceMissing).code, ExitCodes.Validation);
  assert.equal(new AicliLinkError("x", ErrorKinds.LinkCreationFailed).code, ExitCodes.Filesystem);
  assert.equal(new AicliLinkError("x", ErrorKinds.BackupFailed).code, ExitCodes.Filesystem);
  assert.equal(new AicliLinkError("x", ErrorKinds.Filesystem).name, "AicliLinkError");
});

void test("formatError handles errors and other values", () => {
  assert.equal(formatError(new Error("boom")), "boom");
  assert.equal(formatError("plain"), "plain");
});
