import * as fs from "node:fs";
import {
  CompletionItemKind,
  DiagnosticSeverity,
  InlayHintKind,
  MarkupKind,
  type CompletionItem,
  type Diagnostic,
  type Hover,
  type InlayHint,
  type Location,
  type Range,
} from "vscode-languageserver-protocol";
import { ResponseParseError } from "./errors.js";
import { LineIndex } from "./line-index.js";
import { filePathToUri } from "./utils.js";
import type {
  CompilerResponse,
  IdeCheck,
  IdeComplete,
  IdeGotoDef,
  IdeHover,
  IdeSeverity,
  Span,
} from "./types.js";

export const PRELUDE_FILE = "__prelude__";
export const DIAGNOSTIC_SOURCE = "nu";

const SEVERITIES = new Map<string, IdeSeverity>([
  ["error", "error"],
  ["warning", "warning"],
  ["information", "information"],
  ["info", "information"],
  ["hint", "hint"],
]);

const DIAGNOSTIC_SEVERITIES: Record<IdeSeverity, DiagnosticSeverity> = {
  error: DiagnosticSeverity.Error,
  warning: DiagnosticSeverity.Warning,
  information: DiagnosticSeverity.Information,
  hint: DiagnosticSeverity.Hint,
};

// --- Decoding ---

export function decodeCompletions(response: CompilerResponse): IdeComplete {
  const raw = parseObject(response);
  const completions = raw.completions;
  if (!Array.isArray(completions) || !completions.every((c: unknown): c is string => typeof c === "string")) {
    throw new ResponseParseError(response.cmdline, new Error('"completions" must be an array of strings'));
  }
  return { completions };
}

export function decodeHover(response: CompilerResponse): IdeHover {
  const raw = parseObject(response);
  if (typeof raw.hover !== "string") {
    throw new ResponseParseError(response.cmdline, new Error('"hover" must be a string'));
  }
  if (raw.span === undefined || raw.span === null) {
    return { hover: raw.hover };
  }
  const span = toSpan(raw.span);
  if (!span) {
    throw new ResponseParseError(response.cmdline, new Error('"span" must have numeric start and end'));
  }
  return { hover: raw.hover, span };
}

export function decodeGotoDef(response: CompilerResponse): IdeGotoDef {
  const raw = parseObject(response);
  if (typeof raw.file !== "string" || !isOffset(raw.start) || !isOffset(raw.end)) {
    throw new ResponseParseError(response.cmdline, new Error('expected "file", "start" and "end"'));
  }
  return { file: raw.file, start: raw.start, end: raw.end };
}

/** One JSON object per line; anything that does not decode is dropped. */
export function decodeIdeChecks(stdout: string): IdeCheck[] {
  const checks: IdeCheck[] = [];
  for (const line of stdout.split("\n")) {
    if (line.trim().length === 0) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      continue;
    }
    const check = toIdeCheck(raw);
    if (check) checks.push(check);
  }
  return checks;
}

function toIdeCheck(raw: unknown): IdeCheck | null {
  if (!isRecord(raw)) return null;
  switch (raw.type) {
    case "diagnostic": {
      const span = toSpan(raw.span);
      const severity = typeof raw.severity === "string" ? SEVERITIES.get(raw.severity.toLowerCase()) : undefined;
      if (!span || !severity || typeof raw.message !== "string") return null;
      return { type: "diagnostic", message: raw.message, severity, span };
    }
    case "hint": {
      const position = toSpan(raw.position);
      if (!position || typeof raw.typename !== "string") return null;
      return { type: "hint", position, typename: raw.typename };
    }
    default:
      return null;
  }
}

// --- Mapping to protocol types ---

export function toCompletionItems(complete: IdeComplete): CompletionItem[] {
  return complete.completions.map((label, i) => ({
    label,
    kind: label.includes("(") ? CompletionItemKind.Function : CompletionItemKind.Field,
    data: i + 1,
  }));
}

export function toHover(hover: IdeHover, index: LineIndex): Hover {
  return {
    contents: { kind: MarkupKind.Markdown, value: hover.hover },
    ...(hover.span && { range: spanToRange(hover.span, index) }),
  };
}

/**
 * Resolves a definition to a location, or null for the prelude and files
 * that are not on disk. `indexFor` returns the conversion table of the
 * target document when it is open.
 */
export function toDefinitionLocation(
  gotoDef: IdeGotoDef,
  sourceIndex: LineIndex,
  indexFor: (uri: string) => LineIndex | undefined,
  onMissingFile?: (file: string) => void,
): Location | null {
  if (gotoDef.file === "" || gotoDef.file === PRELUDE_FILE) {
    return null;
  }
  if (!fs.existsSync(gotoDef.file)) {
    onMissingFile?.(gotoDef.file);
    return null;
  }

  const uri = filePathToUri(gotoDef.file);
  const index = indexFor(uri) ?? sourceIndex;
  return {
    uri,
    range: spanToRange({ start: gotoDef.start, end: gotoDef.end }, index),
  };
}

export function toDiagnostics(checks: IdeCheck[], index: LineIndex): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const check of checks) {
    if (check.type !== "diagnostic") continue;
    diagnostics.push({
      range: spanToRange(check.span, index),
      severity: DIAGNOSTIC_SEVERITIES[check.severity],
      source: DIAGNOSTIC_SOURCE,
      message: check.message,
    });
  }
  return diagnostics;
}

export function toInlayHints(checks: IdeCheck[], index: LineIndex): InlayHint[] {
  const hints: InlayHint[] = [];
  for (const check of checks) {
    if (check.type !== "hint") continue;
    hints.push({
      position: index.positionAt(check.position.end),
      label: check.typename,
      kind: InlayHintKind.Type,
    });
  }
  return hints;
}

export function spanToRange(span: Span, index: LineIndex): Range {
  return {
    start: index.positionAt(span.start),
    end: index.positionAt(span.end),
  };
}

// --- Helpers ---

function parseObject(response: CompilerResponse): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(response.stdout);
  } catch (err) {
    throw new ResponseParseError(response.cmdline, err);
  }
  if (!isRecord(raw)) {
    throw new ResponseParseError(response.cmdline, new Error("expected a JSON object"));
  }
  return raw;
}

function toSpan(raw: unknown): Span | null {
  if (!isRecord(raw) || !isOffset(raw.start) || !isOffset(raw.end)) return null;
  return { start: raw.start, end: raw.end };
}

function isOffset(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
