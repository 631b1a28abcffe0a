import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { log, logError } from "./utils.js";
import type { Settings } from "./types.js";

export const SETTINGS_SECTION = "nushellLanguageServer";

const CONFIG_NAMES = [
  "nu-lsp.yaml",
  "nu-lsp.yml",
  ".nu-lsp.yaml",
  ".nu-lsp.yml",
];

export function defaultSettings(): Settings {
  return {
    hints: { showInferredTypes: true },
    includeDirs: [],
    maxNumberOfProblems: 1000,
    maxInvocationTimeMs: 10_000,
    executablePath: "nu",
  };
}

/**
 * Reads project-level defaults. The file holds the same fields as the
 * `nushellLanguageServer` client section; settings the client sends are
 * layered over it and it replaces the built-in defaults as the fallback.
 */
export function loadConfig(projectRoot: string): Settings | null {
  let configPath: string | null = null;
  for (const name of CONFIG_NAMES) {
    const candidate = path.join(projectRoot, name);
    if (fs.existsSync(candidate)) {
      configPath = candidate;
      break;
    }
  }

  if (!configPath) {
    log(`No nu-lsp config found in ${projectRoot} (looked for ${CONFIG_NAMES.join(", ")}), using default settings`);
    return null;
  }

  let raw: unknown;
  try {
    const content = fs.readFileSync(configPath, "utf-8");
    raw = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse ${configPath}: ${err instanceof Error ? err.message : err}`);
  }

  const settings = parseSettings(raw ?? {});
  log(`Loaded settings from ${configPath}`);
  return settings;
}

/** Validates `raw` and layers the fields it sets over `base`. */
export function parseSettings(raw: unknown, base: Settings = defaultSettings()): Settings {
  if (!isRecord(raw)) {
    throw new Error("Settings must be an object");
  }

  const settings: Settings = {
    ...base,
    hints: { ...base.hints },
    includeDirs: [...base.includeDirs],
  };

  if (raw.hints !== undefined) {
    if (!isRecord(raw.hints)) {
      throw new Error('"hints" must be an object');
    }
    if (raw.hints.showInferredTypes !== undefined) {
      if (typeof raw.hints.showInferredTypes !== "boolean") {
        throw new Error('"hints.showInferredTypes" must be a boolean');
      }
      settings.hints.showInferredTypes = raw.hints.showInferredTypes;
    }
  }

  if (raw.includeDirs !== undefined) {
    const dirs = raw.includeDirs;
    if (!Array.isArray(dirs) || !dirs.every((d: unknown): d is string => typeof d === "string")) {
      throw new Error('"includeDirs" must be an array of strings');
    }
    settings.includeDirs = dirs;
  }

  if (raw.maxNumberOfProblems !== undefined) {
    settings.maxNumberOfProblems = requireUnsigned(raw.maxNumberOfProblems, "maxNumberOfProblems");
  }

  if (raw.maxNushellInvocationTime !== undefined) {
    settings.maxInvocationTimeMs = requireUnsigned(raw.maxNushellInvocationTime, "maxNushellInvocationTime");
  }

  if (raw.nushellExecutablePath !== undefined) {
    if (typeof raw.nushellExecutablePath !== "string" || raw.nushellExecutablePath.length === 0) {
      throw new Error('"nushellExecutablePath" must be a non-empty string');
    }
    settings.executablePath = raw.nushellExecutablePath;
  }

  return settings;
}

export function settingsOrDefault(raw: unknown, base: Settings = defaultSettings()): Settings {
  try {
    return parseSettings(raw, base);
  } catch (err) {
    logError("Invalid settings, falling back to defaults", err);
    return base;
  }
}

/** Extracts the server's section from a `workspace/didChangeConfiguration` payload. */
export function parseSettingsPayload(payload: unknown, base: Settings = defaultSettings()): Settings {
  if (!isRecord(payload) || payload[SETTINGS_SECTION] === undefined) {
    return base;
  }
  return settingsOrDefault(payload[SETTINGS_SECTION], base);
}

function requireUnsigned(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`"${field}" must be a non-negative integer`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
