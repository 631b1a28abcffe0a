export const VALIDATION_INTERVAL_MS = 500;

export interface ThrottleOptions {
  intervalMs?: number;
  now?: () => number;
}

/**
 * Minimum-interval gate in front of validation. The clock is shared by every
 * document in the session and only advances when a validation succeeds, to
 * its completion time. A validation still in flight counts as recent.
 */
export class ValidationThrottle {
  private validate: (uri: string) => Promise<void>;
  private intervalMs: number;
  private now: () => number;
  private lastValidated: number | null = null;
  private running = false;

  constructor(validate: (uri: string) => Promise<void>, options: ThrottleOptions = {}) {
    this.validate = validate;
    this.intervalMs = options.intervalMs ?? VALIDATION_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  /** Resolves to false when the call was skipped. */
  async run(uri: string): Promise<boolean> {
    if (this.running) {
      return false;
    }
    if (this.lastValidated !== null && this.now() - this.lastValidated < this.intervalMs) {
      return false;
    }

    this.running = true;
    try {
      await this.validate(uri);
      this.lastValidated = this.now();
    } finally {
      this.running = false;
    }
    return true;
  }
}
