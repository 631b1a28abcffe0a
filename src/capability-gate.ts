import type { ClientCapabilities } from "vscode-languageserver-protocol";
import type { CapabilityFlags } from "./types.js";

/**
 * Client capability flags, latched once during `initialize`. Reading them
 * before the handshake means the protocol was driven out of sequence.
 */
export class CapabilityGate {
  private flags: CapabilityFlags | null = null;

  latch(capabilities: ClientCapabilities): CapabilityFlags {
    if (this.flags) {
      throw new Error("client capabilities latched out of sequence");
    }
    this.flags = Object.freeze({
      canChangeConfiguration: capabilities.workspace?.didChangeConfiguration !== undefined,
      canLookupConfiguration: capabilities.workspace?.configuration === true,
      canPublishDiagnostics: capabilities.textDocument?.publishDiagnostics !== undefined,
    });
    return this.flags;
  }

  get latched(): boolean {
    return this.flags !== null;
  }

  get canChangeConfiguration(): boolean {
    return this.require().canChangeConfiguration;
  }

  get canLookupConfiguration(): boolean {
    return this.require().canLookupConfiguration;
  }

  get canPublishDiagnostics(): boolean {
    return this.require().canPublishDiagnostics;
  }

  private require(): CapabilityFlags {
    if (!this.flags) {
      throw new Error("client capabilities read before initialize");
    }
    return this.flags;
  }
}

export function summarizeCapabilities(flags: CapabilityFlags): string {
  const supported: string[] = [];
  if (flags.canPublishDiagnostics) supported.push("publishDiagnostics");
  if (flags.canChangeConfiguration) supported.push("didChangeConfiguration");
  if (flags.canLookupConfiguration) supported.push("configuration");
  return supported.length > 0 ? supported.join(", ") : "none";
}
