import path from "path";
import type { LinkContext } from "./types";

export function expandHome(inputPath: string, homeDir: string): string {
  if (inputPath === "~") {
    return homeDir;
  }
  if (inputPath.startsWith("~/") || inputPath.startsWith("~\\")) {
    return path.join(homeDir, inputPath.slice(2));
  }
  return inputPath;
}

export function resolveFromRoot(root: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    return path.resolve(relativePath);
  }
  return path.resolve(path.join(root, relativePath));
}

/**
 * Resolves a blueprint path to an absolute one. `~` expands to the context's
 * home directory and relative paths are taken from the project root.
 */
export function resolveItemPath(inputPath: string, context: LinkContext): string {
  const expanded = expandHome(inputPath, context.platform.homeDir);
  return resolveFromRoot(context.projectRoot, expanded);
}
