import { ErrorCodes, ResponseError } from "vscode-languageserver-protocol";

export type BridgeErrorKind = "invalidParams" | "internal" | "parse";

/**
 * Base class for failures that are reported back to a single request.
 * The kind selects the JSON-RPC error code.
 */
export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;
  readonly detail?: string;

  constructor(kind: BridgeErrorKind, message: string, detail?: string) {
    super(message);
    this.name = "BridgeError";
    this.kind = kind;
    this.detail = detail;
  }
}

export class DocumentNotFoundError extends BridgeError {
  readonly uri: string;

  constructor(uri: string) {
    super("invalidParams", `${uri} not found in document cache`);
    this.name = "DocumentNotFoundError";
    this.uri = uri;
  }
}

export type CompilerFailure = "path" | "tempFile" | "spawn" | "timeout" | "decode";

export class CompilerError extends BridgeError {
  readonly reason: CompilerFailure;

  constructor(reason: CompilerFailure, message: string, cause?: unknown) {
    super(reason === "decode" ? "parse" : "internal", message, describeCause(cause));
    this.name = "CompilerError";
    this.reason = reason;
  }
}

export class ResponseParseError extends BridgeError {
  constructor(cmdline: string, cause?: unknown) {
    super("parse", `cannot parse response from ${cmdline}`, describeCause(cause));
    this.name = "ResponseParseError";
  }
}

const ERROR_CODES: Record<BridgeErrorKind, number> = {
  invalidParams: ErrorCodes.InvalidParams,
  internal: ErrorCodes.InternalError,
  parse: ErrorCodes.ParseError,
};

export function toResponseError(err: unknown): ResponseError<string | undefined> {
  if (err instanceof ResponseError) {
    return new ResponseError(err.code, err.message, typeof err.data === "string" ? err.data : undefined);
  }
  if (err instanceof BridgeError) {
    return new ResponseError(ERROR_CODES[err.kind], err.message, err.detail);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ResponseError(ErrorCodes.InternalError, message, undefined);
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}
