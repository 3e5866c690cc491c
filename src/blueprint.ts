import fs from "fs/promises";
import path from "path";
import yaml from "yaml";
import { AicliLinkError, ErrorKinds, isErrnoException } from "./errors";
import { fileExists } from "./filesystem";
import type { LinkBlueprint, LinkItem } from "./types";

export const BLUEPRINT_FILE = "aicli-links.json";
export const BLUEPRINT_FILES = [BLUEPRINT_FILE, "aicli-links.yml", "aicli-links.yaml"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(blueprintPath: string, detail: string): AicliLinkError {
  return new AicliLinkError(
    `Invalid blueprint in ${blueprintPath}: ${detail}`,
    ErrorKinds.BlueprintMalformed
  );
}

function requireString(
  value: Record<string, unknown>,
  key: string,
  index: number,
  blueprintPath: string
): string {
  const field = value[key];
  if (typeof field !== "string" || field.length === 0) {
    throw malformed(blueprintPath, `links[${index}].${key} must be a non-empty string`);
  }
  return field;
}

function parseLinkItem(value: unknown, index: number, blueprintPath: string): LinkItem {
  if (!isRecord(value)) {
    throw malformed(blueprintPath, `links[${index}] must be an object`);
  }
  const id = requireString(value, "id", index, blueprintPath);
  const name = requireString(value, "name", index, blueprintPath);
  const source = requireString(value, "source", index, blueprintPath);
  const target = requireString(value, "target", index, blueprintPath);
  const type = value.type;
  if (type !== "file" && type !== "directory") {
    throw malformed(blueprintPath, `links[${index}].type must be "file" or "directory"`);
  }

  const createIfMissing = value.create_if_missing ?? false;
  if (typeof createIfMissing !== "boolean") {
    throw malformed(blueprintPath, `links[${index}].create_if_missing must be a boolean`);
  }
  const defaultContent = value.default_content ?? null;
  if (defaultContent !== null && typeof defaultContent !== "string") {
    throw malformed(blueprintPath, `links[${index}].default_content must be a string or null`);
  }

  return { id, name, type, source, target, createIfMissing, defaultContent };
}

export function parseBlueprint(value: unknown, blueprintPath: string): LinkBlueprint {
  if (!isRecord(value)) {
    throw malformed(blueprintPath, "expected an object");
  }
  const version = value.version;
  if (typeof version !== "string") {
    throw malformed(blueprintPath, "version must be a string");
  }
  const description = value.description ?? "";
  if (typeof description !== "string") {
    throw malformed(blueprintPath, "description must be a string");
  }
  if (!Array.isArray(value.links)) {
    throw malformed(blueprintPath, "links must be an array");
  }
  const links = value.links.map((entry: unknown, index: number) =>
    parseLinkItem(entry, index, blueprintPath)
  );
  const blueprint: LinkBlueprint = { version, description, links };
  assertUniqueIds(blueprint, blueprintPath);
  return blueprint;
}

export function assertUniqueIds(blueprint: LinkBlueprint, origin = "blueprint"): void {
  const seen = new Set<string>();
  for (const item of blueprint.links) {
    if (seen.has(item.id)) {
      throw malformed(origin, `duplicate link id "${item.id}"`);
    }
    seen.add(item.id);
  }
}

function formatParseError(error: unknown, blueprintPath: string): AicliLinkError {
  if (error instanceof yaml.YAMLError) {
    const linePos = error.linePos?.[0];
    const location = linePos ? ` (line ${linePos.line}, col ${linePos.col})` : "";
    return new AicliLinkError(
      `Invalid blueprint in ${blueprintPath}${location}: ${error.message}`,
      ErrorKinds.BlueprintMalformed
    );
  }
  return new AicliLinkError(`Invalid blueprint in ${blueprintPath}`, ErrorKinds.BlueprintMalformed);
}

export async function findBlueprintPath(projectRoot: string): Promise<string | null> {
  for (const file of BLUEPRINT_FILES) {
    const candidate = path.join(projectRoot, file);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

export async function readBlueprintFile(blueprintPath: string): Promise<LinkBlueprint> {
  let raw: string;
  try {
    raw = await fs.readFile(blueprintPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new AicliLinkError(
        `Blueprint not found: ${blueprintPath}`,
        ErrorKinds.BlueprintNotFound
      );
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(raw, { prettyErrors: true });
  } catch (error) {
    throw formatParseError(error, blueprintPath);
  }
  return parseBlueprint(parsed, blueprintPath);
}

export async function readBlueprint(projectRoot: string): Promise<LinkBlueprint> {
  const blueprintPath = await findBlueprintPath(projectRoot);
  if (!blueprintPath) {
    throw new AicliLinkError(
      `Blueprint not found in ${projectRoot} (expected ${BLUEPRINT_FILE}); run "aicli-link init" first`,
      ErrorKinds.BlueprintNotFound
    );
  }
  return await readBlueprintFile(blueprintPath);
}

export function serializeBlueprint(blueprint: LinkBlueprint): string {
  const wire = {
    version: blueprint.version,
    description: blueprint.description,
    links: blueprint.links.map((item) => ({
      id: item.id,
      name: item.name,
      type: item.type,
      source: item.source,
      target: item.target,
      create_if_missing: item.createIfMissing,
      default_content: item.defaultContent
    }))
  };
  return `${JSON.stringify(wire, null, 2)}\n`;
}

export async function writeBlueprint(projectRoot: string, blueprint: LinkBlueprint): Promise<string> {
  const blueprintPath = path.join(projectRoot, BLUEPRINT_FILE);
  await fs.mkdir(projectRoot, { recursive: true });
  await fs.writeFile(blueprintPath, serializeBlueprint(blueprint), "utf8");
  return blueprintPath;
}
