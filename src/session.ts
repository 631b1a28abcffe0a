import {
  PositionEncodingKind,
  TextDocumentSyncKind,
  type CompletionItem,
  type CompletionParams,
  type DefinitionParams,
  type DidChangeConfigurationParams,
  type DidChangeTextDocumentParams,
  type DidChangeWorkspaceFoldersParams,
  type DidCloseTextDocumentParams,
  type DidOpenTextDocumentParams,
  type Hover,
  type HoverParams,
  type InitializeParams,
  type InitializeResult,
  type InlayHint,
  type InlayHintParams,
  type Location,
  type Position,
  type PublishDiagnosticsParams,
} from "vscode-languageserver-protocol";
import { CapabilityGate, summarizeCapabilities } from "./capability-gate.js";
import { defaultSettings } from "./config.js";
import { DocumentStore } from "./document-store.js";
import { SettingsResolver, type ConfigurationSource } from "./settings-resolver.js";
import { ValidationThrottle, type ThrottleOptions } from "./validation-throttle.js";
import {
  decodeCompletions,
  decodeGotoDef,
  decodeHover,
  decodeIdeChecks,
  toCompletionItems,
  toDefinitionLocation,
  toDiagnostics,
  toHover,
  toInlayHints,
} from "./response-mappers.js";
import { log, logError } from "./utils.js";
import type { CompilerBackend, IdeOperation, Settings } from "./types.js";

export const SERVER_NAME = "nu-lsp-bridge";
export const SERVER_VERSION = "0.1.0";

/** What the session needs from the connected editor. */
export interface ClientChannel {
  getConfiguration: ConfigurationSource;
  publishDiagnostics(params: PublishDiagnosticsParams): Promise<void>;
  registerConfigurationChange(): Promise<void>;
}

export interface SessionOptions {
  initialSettings?: Settings;
  throttle?: ThrottleOptions;
}

/**
 * Per-connection state plus the sequencing of every LSP message. Each
 * piece of shared state sits in its own field; handlers copy what they
 * need (a document snapshot, a settings object) before awaiting anything.
 */
export class Session {
  readonly documents = new DocumentStore();
  readonly capabilities = new CapabilityGate();
  readonly settings: SettingsResolver;
  private client: ClientChannel;
  private compiler: CompilerBackend;
  private throttle: ValidationThrottle;

  constructor(client: ClientChannel, compiler: CompilerBackend, options: SessionOptions = {}) {
    this.client = client;
    this.compiler = compiler;
    this.settings = new SettingsResolver(
      this.capabilities,
      (items) => this.client.getConfiguration(items),
      options.initialSettings ?? defaultSettings(),
    );
    this.throttle = new ValidationThrottle((uri) => this.validateDocument(uri), options.throttle);
  }

  // --- Lifecycle ---

  initialize(params: InitializeParams): InitializeResult {
    const flags = this.capabilities.latch(params.capabilities);
    log(`Client capabilities: ${summarizeCapabilities(flags)}`);

    return {
      capabilities: {
        positionEncoding: PositionEncodingKind.UTF16,
        textDocumentSync: TextDocumentSyncKind.Incremental,
        completionProvider: {},
        definitionProvider: true,
        hoverProvider: true,
        inlayHintProvider: { resolveProvider: false },
        workspace: {
          workspaceFolders: {
            supported: true,
            changeNotifications: true,
          },
        },
      },
      serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
    };
  }

  async initialized(): Promise<void> {
    if (this.capabilities.canChangeConfiguration) {
      try {
        await this.client.registerConfigurationChange();
      } catch (err) {
        logError("Unable to register for configuration changes", err);
      }
    }
    log("Server initialized");
  }

  shutdown(): void {
    log("Server shutting down");
  }

  // --- Notifications ---

  async didOpen(params: DidOpenTextDocumentParams): Promise<void> {
    const { uri, text, version } = params.textDocument;
    this.documents.open(uri, text, version);
    await this.validateDocument(uri);
  }

  async didChange(params: DidChangeTextDocumentParams): Promise<void> {
    const { uri, version } = params.textDocument;
    this.documents.applyChange(uri, version, params.contentChanges);
    await this.throttle.run(uri);
  }

  didClose(params: DidCloseTextDocumentParams): void {
    this.documents.close(params.textDocument.uri);
  }

  async didChangeConfiguration(params: DidChangeConfigurationParams): Promise<void> {
    this.settings.onConfigurationChanged(params.settings);

    for (const uri of this.documents.uris()) {
      try {
        await this.validateDocument(uri);
      } catch (err) {
        logError(`Failed to revalidate ${uri}`, err);
      }
    }
  }

  didChangeWorkspaceFolders(params: DidChangeWorkspaceFoldersParams): void {
    const added = params.event.added.map((f) => f.uri);
    const removed = params.event.removed.map((f) => f.uri);
    log("Workspace folders changed", { added, removed });
  }

  // --- Requests ---

  async completion(params: CompletionParams): Promise<CompletionItem[]> {
    const { response } = await this.runAtPosition(params.textDocument.uri, params.position, "complete");
    return toCompletionItems(decodeCompletions(response));
  }

  async hover(params: HoverParams): Promise<Hover> {
    const { response, snapshot } = await this.runAtPosition(params.textDocument.uri, params.position, "hover");
    return toHover(decodeHover(response), snapshot.index);
  }

  async definition(params: DefinitionParams): Promise<Location | null> {
    const { response, snapshot } = await this.runAtPosition(params.textDocument.uri, params.position, "gotoDef");
    const gotoDef = decodeGotoDef(response);
    return toDefinitionLocation(
      gotoDef,
      snapshot.index,
      (uri) => (this.documents.has(uri) ? this.documents.snapshot(uri).index : undefined),
      (file) => logError(`File ${file} does not exist`),
    );
  }

  async inlayHint(params: InlayHintParams): Promise<InlayHint[]> {
    const uri = params.textDocument.uri;
    const snapshot = this.documents.snapshot(uri);
    const settings = await this.settings.getSettings(uri);
    if (!settings.hints.showInferredTypes) {
      return [];
    }

    const response = await this.compiler.run({
      text: snapshot.index.text,
      operation: { kind: "check" },
      settings,
      uri,
    });
    const { start, end } = params.range;
    return toInlayHints(decodeIdeChecks(response.stdout), snapshot.index).filter(
      (hint) => !isBefore(hint.position, start) && !isBefore(end, hint.position),
    );
  }

  // --- Validation ---

  async validateDocument(uri: string): Promise<void> {
    if (!this.capabilities.canPublishDiagnostics) {
      log("Client did not report diagnostic capability, skipping validation");
      return;
    }

    const snapshot = this.documents.snapshot(uri);
    const settings = await this.settings.getSettings(uri);
    const response = await this.compiler.run({
      text: snapshot.index.text,
      operation: { kind: "check" },
      settings,
      uri,
    });

    const diagnostics = toDiagnostics(decodeIdeChecks(response.stdout), snapshot.index);
    await this.client.publishDiagnostics({ uri, version: snapshot.version, diagnostics });
  }

  private async runAtPosition(uri: string, position: Position, kind: Exclude<IdeOperation["kind"], "check">) {
    const snapshot = this.documents.snapshot(uri);
    const offset = snapshot.index.offsetAt(position);
    const settings = await this.settings.getSettings(uri);
    const response = await this.compiler.run({
      text: snapshot.index.text,
      operation: { kind, offset },
      settings,
      uri,
    });
    return { response, snapshot };
  }
}

function isBefore(a: Position, b: Position): boolean {
  return a.line < b.line || (a.line === b.line && a.character < b.character);
}
