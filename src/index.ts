#!/usr/bin/env node

import * as path from "node:path";
import { createConnection } from "vscode-languageserver/node.js";
import { loadConfig } from "./config.js";
import { NuCompiler } from "./compiler.js";
import { bindSession } from "./server.js";
import { log, logError } from "./utils.js";
import type { Settings } from "./types.js";

function main(): void {
  const projectRoot = process.env.NU_LSP_PROJECT_ROOT
    ? path.resolve(process.env.NU_LSP_PROJECT_ROOT)
    : process.cwd();

  log(`nu-lsp-bridge starting for project: ${projectRoot}`);

  let initialSettings: Settings | undefined;
  try {
    initialSettings = loadConfig(projectRoot) ?? undefined;
  } catch (err) {
    logError("Ignoring project config", err);
  }

  // Transport (stdio, socket or pipe) is picked from the command line.
  const connection = createConnection();
  bindSession(connection, new NuCompiler(), initialSettings);
  connection.listen();
  log("Language server listening");
}

try {
  main();
} catch (err) {
  logError("Fatal error", err);
  process.exit(1);
}
