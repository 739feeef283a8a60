/**
 * Single-flight registry
 *
 * Collapses identical concurrent computations into one shared Promise so a
 * cold fingerprint costs at most one remote call no matter how many request
 * flows ask for it at once.
 *
 * Architecture:
 * - Map<key, Promise<T>> holding only in-flight work
 * - Entry removed as soon as the promise settles (success or failure), so a
 *   rejection is never replayed to later callers
 */

import type { Logger } from 'pino';

export interface SingleFlightStats {
  inFlight: number;
  leaders: number;
  followers: number;
}

export class SingleFlight<T> {
  private readonly logger?: Logger;
  private readonly inFlight = new Map<string, Promise<T>>();

  private stats = {
    leaders: 0,
    followers: 0,
  };

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Run `work` for `key`, or join the computation already running for it.
   */
  public run(key: string, work: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.stats.followers++;
      this.logger?.debug({ key }, 'Joined in-flight computation');
      return existing;
    }

    this.stats.leaders++;
    // work starts on the next microtask, after the entry is registered
    const shared: Promise<T> = Promise.resolve()
      .then(work)
      .finally(() => {
        if (this.inFlight.get(key) === shared) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, shared);
    return shared;
  }

  public isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  public getStats(): SingleFlightStats {
    return {
      inFlight: this.inFlight.size,
      leaders: this.stats.leaders,
      followers: this.stats.followers,
    };
  }
}
