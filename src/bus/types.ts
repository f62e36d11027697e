/** Called once per delivered message with the decoded JSON payload */
export type MessageHandler = (payload: unknown) => void | Promise<void>;

export interface Subscription {
  readonly channel: string;
  /** Stop delivery and wait for the message in flight to finish */
  close(): Promise<void>;
}

export interface EventBus {
  /** Resolves to the number of subscribers that received the message */
  publish(channel: string, payload: unknown): Promise<number>;
  subscribe(channel: string, handler: MessageHandler): Promise<Subscription>;
  close(): Promise<void>;
}

/** Transport-level failure (connection lost, publish rejected) */
export class EventBusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EventBusError";
  }
}
