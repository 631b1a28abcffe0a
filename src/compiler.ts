import { spawn, type ChildProcess } from "node:child_process";
import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { CompilerError } from "./errors.js";
import { isFileUri, log, logError, uriToFilePath } from "./utils.js";
import type { CompilerBackend, CompilerRequest, CompilerResponse, IdeOperation, Settings } from "./types.js";

// ASCII record separator; never part of a real path.
export const INCLUDE_PATH_SEPARATOR = "\x1e";

const TEMP_FILE_PREFIX = "nu-lsp-";
const TEMP_FILE_SUFFIX = ".nu";

export function buildOperationArguments(operation: IdeOperation, settings: Settings): string[] {
  switch (operation.kind) {
    case "check":
      return ["--ide-check", String(settings.maxNumberOfProblems)];
    case "complete":
      return ["--ide-complete", String(operation.offset)];
    case "hover":
      return ["--ide-hover", String(operation.offset)];
    case "gotoDef":
      return ["--ide-goto-def", String(operation.offset)];
  }
}

/** Parent directory of a local source file followed by the configured include dirs. */
export function buildIncludePath(uri: string, includeDirs: readonly string[]): string | null {
  const dirs: string[] = [];
  if (isFileUri(uri)) {
    let filePath: string;
    try {
      filePath = uriToFilePath(uri);
    } catch (err) {
      throw new CompilerError("path", `cannot convert ${uri} to a file path`, err);
    }
    dirs.push(path.dirname(filePath));
  }
  dirs.push(...includeDirs);
  return dirs.length > 0 ? dirs.join(INCLUDE_PATH_SEPARATOR) : null;
}

export function decodeOutput(stdout: Buffer, cmdline: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(stdout);
  } catch (err) {
    throw new CompilerError("decode", `non-UTF-8 output from ${cmdline}`, err);
  }
}

/**
 * Runs the `nu` executable in IDE mode. The compiler only reads IDE queries
 * from a file, so each call writes the in-memory text to its own temporary
 * file and removes it afterwards.
 */
export class NuCompiler implements CompilerBackend {
  async run(request: CompilerRequest): Promise<CompilerResponse> {
    const { text, operation, settings, uri } = request;
    const args = buildOperationArguments(operation, settings);

    const includePath = buildIncludePath(uri, settings.includeDirs);
    if (includePath !== null) {
      args.push("--include-path", includePath);
    }

    const tempFile = path.join(os.tmpdir(), `${TEMP_FILE_PREFIX}${randomUUID()}${TEMP_FILE_SUFFIX}`);
    try {
      try {
        await fs.promises.writeFile(tempFile, text, { encoding: "utf-8", flag: "wx" });
      } catch (err) {
        throw new CompilerError("tempFile", `cannot write temporary file ${tempFile}`, err);
      }
      args.push(tempFile);

      const cmdline = [settings.executablePath, ...args].join(" ");
      const stdout = await execute(settings.executablePath, args, settings.maxInvocationTimeMs, cmdline);
      return { cmdline, stdout: decodeOutput(stdout, cmdline) };
    } finally {
      await removeTempFile(tempFile);
    }
  }
}

// The exit status is ignored: diagnostics come with a non-zero exit.
function execute(executable: string, args: string[], timeoutMs: number, cmdline: string): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(executable, args, { stdio: ["ignore", "pipe", "pipe"], windowsHide: true });
    } catch (err) {
      reject(new CompilerError("spawn", `cannot start ${cmdline}`, err));
      return;
    }

    const chunks: Buffer[] = [];
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill("SIGKILL");
      reject(new CompilerError("timeout", `${cmdline} did not finish within ${timeoutMs}ms`));
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });

    child.stderr?.on("data", (data: Buffer) => {
      log(`[${executable}] stderr: ${data.toString().trimEnd()}`);
    });

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new CompilerError("spawn", `cannot start ${cmdline}`, err));
    });

    child.on("close", () => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(Buffer.concat(chunks));
    });
  });
}

async function removeTempFile(tempFile: string): Promise<void> {
  try {
    await fs.promises.rm(tempFile, { force: true });
  } catch (err) {
    logError(`Failed to remove temporary file ${tempFile}`, err);
  }
}
