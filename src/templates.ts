import type { LinkBlueprint } from "./types";

export const BLUEPRINT_VERSION = "0.2.0";

const CLAUDE_MD = `# CLAUDE.md

Context for Claude Code in this workspace.

## Project overview

## Development guidelines
`;

const GEMINI_MD = `# GEMINI.md

Context for Gemini CLI in this workspace.

## Project overview

## Development guidelines
`;

const CLAUDE_SETTINGS = `${JSON.stringify(
  {
    permissions: { allow: [], deny: [] },
    hooks: {},
    mcpServers: {}
  },
  null,
  2
)}\n`;

const GEMINI_SETTINGS = `${JSON.stringify({ theme: "auto", mcpServers: {} }, null, 2)}\n`;

export function createDefaultBlueprint(): LinkBlueprint {
  return {
    version: BLUEPRINT_VERSION,
    description: "AI CLI context and settings shared from this repository",
    links: [
      {
        id: "claude-md",
        name: "Claude Code user memory",
        type: "file",
        source: "project-configs/CLAUDE.md",
        target: "~/.claude/CLAUDE.md",
        createIfMissing: true,
        defaultContent: CLAUDE_MD
      },
      {
        id: "claude-settings",
        name: "Claude Code settings",
        type: "file",
        source: "project-configs/claude_settings.json",
        target: "~/.claude/settings.json",
        createIfMissing: true,
        defaultContent: CLAUDE_SETTINGS
      },
      {
        id: "claude-commands",
        name: "Claude Code custom commands",
        type: "directory",
        source: "project-configs/claude/commands",
        target: "~/.claude/commands",
        createIfMissing: true,
        defaultContent: null
      },
      {
        id: "gemini-md",
        name: "Gemini CLI context",
        type: "file",
        source: "project-configs/GEMINI.md",
        target: "~/.gemini/GEMINI.md",
        createIfMissing: true,
        defaultContent: GEMINI_MD
      },
      {
        id: "gemini-settings",
        name: "Gemini CLI settings",
        type: "file",
        source: "project-configs/gemini_settings.json",
        target: "~/.gemini/settings.json",
        createIfMissing: true,
        defaultContent: GEMINI_SETTINGS
      }
    ]
  };
}
