export type WireProperties = Record<string, string | number | boolean>;

/**
 * A broker message as the relay sees it: application properties plus a body.
 * Received bodies are untyped until the codec has checked them.
 */
export interface WireMessage<TBody = unknown> {
  properties: WireProperties;
  body: TBody;
}

export type DeliveryHandler = (message: WireMessage) => Promise<void>;

export interface QueueSubscription {
  readonly queue: string;
  cancel(): Promise<void>;
}

export type QueueClientState = "idle" | "connecting" | "open" | "reconnecting" | "closed" | "failed";

export type FatalErrorListener = (error: Error) => void;

/**
 * Point-to-point queue access. Implementations deliver at most one message at
 * a time per subscription and wait for the handler before the next one.
 * A handler that rejects has its delivery rejected (dead-lettered by the
 * broker where one is configured).
 */
export interface IQueueClient {
  connect(): Promise<void>;
  consume(queue: string, handler: DeliveryHandler): Promise<QueueSubscription>;
  send(queue: string, message: WireMessage<string>): Promise<void>;
  close(): Promise<void>;
  getState(): QueueClientState;
  /** Called once reconnect attempts are exhausted and the client gives up. */
  onFatal(listener: FatalErrorListener): void;
}
