import type { ConfigurationItem } from "vscode-languageserver-protocol";
import { CapabilityGate } from "./capability-gate.js";
import { SETTINGS_SECTION, defaultSettings, parseSettingsPayload, settingsOrDefault } from "./config.js";
import { log } from "./utils.js";
import type { Settings } from "./types.js";

/** Pulls `workspace/configuration` from the client. */
export type ConfigurationSource = (items: ConfigurationItem[]) => Promise<unknown[]>;

export class SettingsResolver {
  private gate: CapabilityGate;
  private fetchConfiguration: ConfigurationSource;
  private defaults: Settings;
  private globalSettings: Settings;
  private documentSettings: Map<string, Settings> = new Map();

  constructor(gate: CapabilityGate, fetchConfiguration: ConfigurationSource, initial: Settings = defaultSettings()) {
    this.gate = gate;
    this.fetchConfiguration = fetchConfiguration;
    this.defaults = initial;
    this.globalSettings = initial;
  }

  get global(): Settings {
    return this.globalSettings;
  }

  get cachedUris(): string[] {
    return Array.from(this.documentSettings.keys());
  }

  async getSettings(uri: string): Promise<Settings> {
    if (!this.gate.canLookupConfiguration) {
      return this.globalSettings;
    }

    const cached = this.documentSettings.get(uri);
    if (cached) {
      return cached;
    }

    log(`Fetching settings for ${uri}`);
    const values = await this.fetchConfiguration([{ scopeUri: uri, section: SETTINGS_SECTION }]);
    if (values.length === 0) {
      log("Client returned no configuration, using default settings");
      return this.defaults;
    }

    const settings = settingsOrDefault(values[0], this.defaults);
    this.documentSettings.set(uri, settings);
    return settings;
  }

  onConfigurationChanged(payload: unknown): void {
    if (this.gate.canLookupConfiguration) {
      this.documentSettings.clear();
      return;
    }
    this.globalSettings = parseSettingsPayload(payload, this.defaults);
  }
}
