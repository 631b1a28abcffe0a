export interface HintSettings {
  showInferredTypes: boolean;
}

export interface Settings {
  hints: HintSettings;
  includeDirs: string[];
  maxNumberOfProblems: number;
  maxInvocationTimeMs: number;
  executablePath: string;
}

export interface CapabilityFlags {
  canPublishDiagnostics: boolean;
  canChangeConfiguration: boolean;
  canLookupConfiguration: boolean;
}

/** Byte offsets into the text that was handed to the compiler. */
export interface Span {
  start: number;
  end: number;
}

export type IdeOperation =
  | { kind: "check" }
  | { kind: "complete"; offset: number }
  | { kind: "hover"; offset: number }
  | { kind: "gotoDef"; offset: number };

export interface CompilerRequest {
  text: string;
  operation: IdeOperation;
  settings: Settings;
  uri: string;
}

export interface CompilerResponse {
  cmdline: string;
  stdout: string;
}

export interface CompilerBackend {
  run(request: CompilerRequest): Promise<CompilerResponse>;
}

export type IdeSeverity = "error" | "warning" | "information" | "hint";

export type IdeCheck =
  | { type: "diagnostic"; message: string; severity: IdeSeverity; span: Span }
  | { type: "hint"; position: Span; typename: string };

export interface IdeComplete {
  completions: string[];
}

export interface IdeGotoDef {
  file: string;
  start: number;
  end: number;
}

export interface IdeHover {
  hover: string;
  span?: Span;
}
