import { log, errMessage } from "../logger.js";
import type { MessageHandler } from "./types.js";

/**
 * Per-subscription FIFO: a message is handed to the handler only after the
 * previous one settled. Handler errors are logged, the queue keeps going.
 */
export class DeliveryQueue {
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private inFlight = 0;

  constructor(
    private readonly channel: string,
    private readonly handler: MessageHandler
  ) {}

  push(payload: unknown): void {
    if (this.closed) return;
    this.inFlight++;
    this.tail = this.tail.then(() => this.deliver(payload));
  }

  /** Messages queued or being handled */
  get pending(): number {
    return this.inFlight;
  }

  /** Resolves once everything queued so far, and meanwhile, is handled */
  async drain(): Promise<void> {
    let seen: Promise<void>;
    do {
      seen = this.tail;
      await seen;
    } while (seen !== this.tail);
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  private async deliver(payload: unknown) {
    try {
      await this.handler(payload);
    } catch (err) {
      log.error(`[BUS] handler failed on ${this.channel}`, errMessage(err));
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Subscription count per channel, so a transport subscribes on the first
 * listener and unsubscribes only when the last one goes.
 */
export class ChannelRefs {
  private readonly counts = new Map<string, number>();

  /** True when this is the channel's first listener */
  add(channel: string): boolean {
    const n = this.counts.get(channel) ?? 0;
    this.counts.set(channel, n + 1);
    return n === 0;
  }

  /** True when the channel has no listener left */
  remove(channel: string): boolean {
    const n = this.counts.get(channel) ?? 0;
    if (n <= 1) {
      this.counts.delete(channel);
      return true;
    }
    this.counts.set(channel, n - 1);
    return false;
  }

  count(channel: string): number {
    return this.counts.get(channel) ?? 0;
  }
}

/** JSON text → payload; undefined (and a log line) when it doesn't parse */
export function decodeMessage(channel: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    log.warn(`[BUS] dropped undecodable message on ${channel}`, {
      error: errMessage(err),
      raw: raw.slice(0, 200),
    });
    return undefined;
  }
}
