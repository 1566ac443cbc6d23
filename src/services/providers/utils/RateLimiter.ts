import { TIME } from '../../../config/constants.js';

export interface RateLimiterConfig {
  requestsPerSecond: number;
  /** Clock and timer, replaceable in tests */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sliding one-second window over the requests of one provider client.
 *
 * Callers are admitted one at a time in arrival order; a caller that would
 * exceed the window waits until its oldest request ages out.
 */
export class RateLimiter {
  private readonly capacity: number;
  private readonly started: number[] = [];
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private admission: Promise<void> = Promise.resolve();

  constructor(config: RateLimiterConfig) {
    if (!(config.requestsPerSecond > 0)) {
      throw new RangeError('requestsPerSecond must be positive');
    }
    this.capacity = config.requestsPerSecond;
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async execute<T>(task: () => Promise<T>): Promise<T> {
    const turn = this.admission.then(() => this.takeSlot());
    this.admission = turn;
    await turn;
    return task();
  }

  /** Requests still allowed in the current window */
  remaining(): number {
    this.prune();
    return this.capacity - this.started.length;
  }

  private async takeSlot(): Promise<void> {
    this.prune();
    let oldest = this.started[0];
    while (this.started.length >= this.capacity && oldest !== undefined) {
      await this.sleep(Math.max(1, oldest + TIME.ONE_SECOND - this.now()));
      this.prune();
      oldest = this.started[0];
    }
    this.started.push(this.now());
  }

  private prune(): void {
    const cutoff = this.now() - TIME.ONE_SECOND;
    while (this.started.length > 0 && (this.started[0] ?? cutoff) <= cutoff) {
      this.started.shift();
    }
  }
}
