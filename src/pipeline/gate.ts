import { log } from "../logger.js";
import type { MarketEvent } from "../types.js";
import { systemClock, type Clock } from "../util/clock.js";

export type GateOptions = {
  minChangePercent: number;
  minVolume: number;
  dedupWindowMs: number;
  clock?: Clock;
};

export type GateDecision =
  | { admit: true }
  | { admit: false; reason: "change" | "volume" | "recent" };

/**
 * Admission control for enrichment: big enough move, enough volume, and no
 * alert for the same symbol inside the dedup window.
 */
export class AdmissionGate {
  private readonly recentlyProcessed = new Map<string, number>();
  private readonly clock: Clock;

  constructor(private readonly opts: GateOptions) {
    this.clock = opts.clock ?? systemClock;
  }

  evaluate(event: MarketEvent): GateDecision {
    if (Math.abs(event.changePercent) < this.opts.minChangePercent) {
      return { admit: false, reason: "change" };
    }
    if (event.volume < this.opts.minVolume) {
      return { admit: false, reason: "volume" };
    }
    const last = this.recentlyProcessed.get(event.symbol);
    if (last !== undefined && !this.isExpired(last, this.clock.now())) {
      return { admit: false, reason: "recent" };
    }
    return { admit: true };
  }

  shouldProcess(event: MarketEvent): boolean {
    return this.evaluate(event).admit;
  }

  /** Mark `symbol` as alerted now; expired entries are purged first. */
  record(symbol: string): void {
    this.purgeExpired();
    this.recentlyProcessed.set(symbol, this.clock.now());
  }

  purgeExpired(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [symbol, at] of this.recentlyProcessed) {
      if (this.isExpired(at, now)) {
        this.recentlyProcessed.delete(symbol);
        removed++;
      }
    }
    if (removed) log.debug(`[GATE] purged ${removed} expired dedup entries`);
    return removed;
  }

  size(): number {
    return this.recentlyProcessed.size;
  }

  private isExpired(at: number, now: number) {
    return now - at >= this.opts.dedupWindowMs;
  }
}
