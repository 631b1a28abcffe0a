import type { Connection, RemoteConsole } from "vscode-languageserver/node.js";
import { DidChangeConfigurationNotification } from "vscode-languageserver-protocol";
import { toResponseError } from "./errors.js";
import { Session, type ClientChannel } from "./session.js";
import { log, logError } from "./utils.js";
import type { CompilerBackend, Settings } from "./types.js";

export function createClientChannel(connection: Connection): ClientChannel {
  return {
    getConfiguration: (items) => connection.workspace.getConfiguration(items),
    publishDiagnostics: (params) => connection.sendDiagnostics(params),
    registerConfigurationChange: async () => {
      await connection.client.register(DidChangeConfigurationNotification.type, undefined);
    },
  };
}

/** Where notification failures are reported besides stderr (`window/logMessage`). */
export type ErrorConsole = Pick<RemoteConsole, "error">;

/** Requests answer with a JSON-RPC error; the session itself keeps running. */
export async function handleRequest<T>(method: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    logError(`Request ${method} failed`, err);
    throw toResponseError(err);
  }
}

// Notifications have no response, so failures are logged and shown in the editor's log.
export function handleNotification(method: string, run: () => Promise<void> | void, editorConsole: ErrorConsole): Promise<void> {
  return Promise.resolve()
    .then(run)
    .catch((err: unknown) => {
      logError(`Notification ${method} failed`, err);
      editorConsole.error(`Notification ${method} failed: ${err instanceof Error ? err.message : String(err)}`);
    });
}

export function bindSession(connection: Connection, compiler: CompilerBackend, initialSettings?: Settings): Session {
  const session = new Session(createClientChannel(connection), compiler, { initialSettings });
  let supportsWorkspaceFolders = false;

  connection.onInitialize((params) => {
    supportsWorkspaceFolders = params.capabilities.workspace?.workspaceFolders === true;
    return session.initialize(params);
  });

  connection.onInitialized(() => {
    if (supportsWorkspaceFolders) {
      connection.workspace.onDidChangeWorkspaceFolders((event) =>
        handleNotification("workspace/didChangeWorkspaceFolders", () => session.didChangeWorkspaceFolders({ event }), connection.console),
      );
    }
    void handleNotification("initialized", () => session.initialized(), connection.console);
  });

  connection.onShutdown(() => session.shutdown());

  connection.onDidOpenTextDocument((params) =>
    handleNotification("textDocument/didOpen", () => session.didOpen(params), connection.console),
  );
  connection.onDidChangeTextDocument((params) =>
    handleNotification("textDocument/didChange", () => session.didChange(params), connection.console),
  );
  connection.onDidCloseTextDocument((params) =>
    handleNotification("textDocument/didClose", () => session.didClose(params), connection.console),
  );
  connection.onDidChangeConfiguration((params) =>
    handleNotification("workspace/didChangeConfiguration", () => session.didChangeConfiguration(params), connection.console),
  );

  connection.onCompletion((params) => handleRequest("textDocument/completion", () => session.completion(params)));
  connection.onHover((params) => handleRequest("textDocument/hover", () => session.hover(params)));
  connection.onDefinition((params) => handleRequest("textDocument/definition", () => session.definition(params)));
  connection.languages.inlayHint.on((params) =>
    handleRequest("textDocument/inlayHint", () => session.inlayHint(params)),
  );

  log("Session bound to connection");
  return session;
}
