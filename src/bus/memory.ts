import { EventEmitter } from "events";
import { DeliveryQueue, decodeMessage } from "./delivery.js";
import type { EventBus, MessageHandler, Subscription } from "./types.js";

/**
 * In-process bus with the same semantics as the Redis one: payloads go
 * through JSON, delivery is FIFO per subscription, publish returns the
 * subscriber count (0 when nobody listens).
 */
export class InMemoryEventBus implements EventBus {
  private readonly emitter = new EventEmitter();
  private readonly queues = new Set<DeliveryQueue>();

  async publish(channel: string, payload: unknown): Promise<number> {
    const raw = JSON.stringify(payload);
    const receivers = this.emitter.listenerCount(channel);
    this.emitter.emit(channel, raw);
    return receivers;
  }

  /** Raw text publish, for exercising the decode path */
  publishRaw(channel: string, raw: string): number {
    const receivers = this.emitter.listenerCount(channel);
    this.emitter.emit(channel, raw);
    return receivers;
  }

  async subscribe(
    channel: string,
    handler: MessageHandler
  ): Promise<Subscription> {
    const queue = new DeliveryQueue(channel, handler);
    const onMessage = (raw: string) => {
      const payload = decodeMessage(channel, raw);
      if (payload !== undefined) queue.push(payload);
    };
    this.emitter.on(channel, onMessage);
    this.queues.add(queue);

    return {
      channel,
      close: async () => {
        this.emitter.off(channel, onMessage);
        this.queues.delete(queue);
        await queue.close();
      },
    };
  }

  /**
   * Wait until no subscription has anything left, including messages the
   * handlers published meanwhile
   */
  async idle(): Promise<void> {
    while ([...this.queues].some((q) => q.pending > 0)) {
      await Promise.all([...this.queues].map((q) => q.drain()));
    }
  }

  async close(): Promise<void> {
    await Promise.all([...this.queues].map((q) => q.close()));
    this.queues.clear();
    this.emitter.removeAllListeners();
  }
}
