import { TextDocument } from "vscode-languageserver-textdocument";
import type { Position, TextDocumentContentChangeEvent } from "vscode-languageserver-protocol";
import { LineIndex } from "./line-index.js";
import { DocumentNotFoundError } from "./errors.js";

const LANGUAGE_ID = "nushell";

/** Immutable view of a document at one version. */
export interface DocumentSnapshot {
  uri: string;
  version: number;
  index: LineIndex;
}

interface TrackedDocument {
  document: TextDocument;
  index: LineIndex | null;
}

/**
 * Open documents keyed by uri. Every mutation is synchronous, so readers
 * never see a half-applied change; callers that await take a snapshot first.
 */
export class DocumentStore {
  private documents: Map<string, TrackedDocument> = new Map();

  open(uri: string, text: string, version: number): void {
    this.documents.set(uri, {
      document: TextDocument.create(uri, LANGUAGE_ID, version, text),
      index: null,
    });
  }

  applyChange(uri: string, version: number, changes: TextDocumentContentChangeEvent[]): void {
    const tracked = this.require(uri);
    tracked.document = TextDocument.update(tracked.document, changes, version);
    tracked.index = null;
  }

  close(uri: string): void {
    this.documents.delete(uri);
  }

  has(uri: string): boolean {
    return this.documents.has(uri);
  }

  uris(): string[] {
    return Array.from(this.documents.keys());
  }

  getContent(uri: string): string {
    return this.require(uri).document.getText();
  }

  version(uri: string): number {
    return this.require(uri).document.version;
  }

  offsetAt(uri: string, position: Position): number {
    return this.snapshot(uri).index.offsetAt(position);
  }

  positionAt(uri: string, offset: number): Position {
    return this.snapshot(uri).index.positionAt(offset);
  }

  snapshot(uri: string): DocumentSnapshot {
    const tracked = this.require(uri);
    if (!tracked.index) {
      tracked.index = new LineIndex(tracked.document.getText());
    }
    return { uri, version: tracked.document.version, index: tracked.index };
  }

  private require(uri: string): TrackedDocument {
    const tracked = this.documents.get(uri);
    if (!tracked) throw new DocumentNotFoundError(uri);
    return tracked;
  }
}
