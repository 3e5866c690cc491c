import path from "path";
import type { LinkItemType, PlatformInfo } from "./types";

export type ToolId = "claude-code" | "gemini-cli" | "claude-desktop";

export const TOOL_IDS: readonly ToolId[] = ["claude-code", "gemini-cli", "claude-desktop"];

export function isToolId(value: string): value is ToolId {
  return TOOL_IDS.some((tool) => tool === value);
}

export const PROJECT_CONFIG_DIR = "project-configs";

export interface ToolFile {
  /** Registry id: the tool id, or `<tool>/<role>` for secondary files. */
  id: string;
  name: string;
  type: LinkItemType;
  projectPath: string;
  systemPath: string;
}

export interface ToolMapping {
  tool: ToolId;
  displayName: string;
  files: ToolFile[];
}

function claudeDesktopConfigDir(platform: PlatformInfo): string {
  switch (platform.os) {
    case "macos":
      return path.join(platform.homeDir, "Library", "Application Support", "Claude");
    case "windows":
      return path.join(
        platform.appDataDir ?? path.join(platform.homeDir, "AppData", "Roaming"),
        "Claude"
      );
    case "linux":
    case "other":
      return path.join(platform.homeDir, ".config", "Claude");
  }
}

/** Project paths are relative to the project root, system paths absolute. */
export function getToolMapping(tool: ToolId, platform: PlatformInfo): ToolMapping {
  const home = platform.homeDir;
  switch (tool) {
    case "claude-code":
      return {
        tool,
        displayName: "Claude Code",
        files: [
          {
            id: "claude-code",
            name: "Claude Code settings",
            type: "file",
            projectPath: path.join(PROJECT_CONFIG_DIR, "claude_settings.json"),
            systemPath: path.join(home, ".claude", "settings.json")
          },
          {
            id: "claude-code/context",
            name: "Claude Code context",
            type: "file",
            projectPath: path.join(PROJECT_CONFIG_DIR, "CLAUDE.md"),
            systemPath: path.join(home, "CLAUDE.md")
          }
        ]
      };
    case "gemini-cli":
      return {
        tool,
        displayName: "Gemini CLI",
        files: [
          {
            id: "gemini-cli",
            name: "Gemini CLI settings",
            type: "file",
            projectPath: path.join(PROJECT_CONFIG_DIR, "gemini_settings.json"),
            systemPath: path.join(home, ".gemini", "settings.json")
          },
          {
            id: "gemini-cli/context",
            name: "Gemini CLI context",
            type: "file",
            projectPath: path.join(PROJECT_CONFIG_DIR, "GEMINI.md"),
            systemPath: path.join(home, "GEMINI.md")
          }
        ]
      };
    case "claude-desktop":
      return {
        tool,
        displayName: "Claude Desktop",
        files: [
          {
            id: "claude-desktop",
            name: "Claude Desktop MCP servers",
            type: "file",
            projectPath: path.join(PROJECT_CONFIG_DIR, "mcp-servers-config.json"),
            systemPath: path.join(claudeDesktopConfigDir(platform), "claude_desktop_config.json")
          }
        ]
      };
  }
}
