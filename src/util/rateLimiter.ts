import { log, errMessage } from "../logger.js";
import { systemClock, sleep, type Clock, type Sleep } from "./clock.js";

/**
 * Minimum-interval gate shared by every outbound call of one client.
 * Callers queue on a promise chain, so concurrent fetches are served one at a
 * time in arrival order and two calls never start closer than `minIntervalMs`.
 */
export class RateLimiter {
  private lastCallAt = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
    private readonly wait: Sleep = sleep
  ) {}

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.takeTurn());
    this.tail = turn.catch((err) => {
      log.warn("[RATE] wait aborted", errMessage(err));
    });
    return turn;
  }

  private async takeTurn() {
    const elapsed = this.clock.now() - this.lastCallAt;
    if (elapsed < this.minIntervalMs) {
      const ms = this.minIntervalMs - elapsed;
      log.debug(`[RATE] sleeping ${ms}ms`);
      await this.wait(ms);
    }
    this.lastCallAt = this.clock.now();
  }
}
