import { pathToFileURL, fileURLToPath } from "node:url";

const FILE_SCHEME = "file:";

// stdout carries the protocol stream, so everything goes to stderr.
export function log(message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  if (args.length > 0) {
    process.stderr.write(`[${timestamp}] ${message} ${args.map(a => JSON.stringify(a)).join(" ")}\n`);
  } else {
    process.stderr.write(`[${timestamp}] ${message}\n`);
  }
}

export function logError(message: string, error?: unknown): void {
  const timestamp = new Date().toISOString();
  const errorMsg = error instanceof Error ? error.message : String(error ?? "");
  process.stderr.write(`[${timestamp}] ERROR: ${message}${errorMsg ? ` — ${errorMsg}` : ""}\n`);
}

export function filePathToUri(filePath: string): string {
  return pathToFileURL(filePath).toString();
}

export function uriToFilePath(uri: string): string {
  return fileURLToPath(uri);
}

export function isFileUri(uri: string): boolean {
  return uri.startsWith(FILE_SCHEME);
}
