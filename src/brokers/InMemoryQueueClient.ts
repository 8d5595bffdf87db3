import {
  DeliveryHandler,
  FatalErrorListener,
  IQueueClient,
  QueueClientState,
  QueueSubscription,
  WireMessage,
} from "../interfaces";
import { Loggable } from "../logging/Loggable";
import { BrokerConnectivityError } from "../core/errors";

/**
 * Broker stand-in that keeps queues in process. Used by `MQ_TRANSPORT=memory`
 * and by the tests. Each queue has at most one consumer, deliveries are
 * handed out one at a time, and a rejected delivery lands in that queue's
 * dead-letter list.
 */
export class InMemoryQueueClient extends Loggable implements IQueueClient {
  private queues: Map<string, WireMessage[]> = new Map();
  private consumers: Map<string, DeliveryHandler> = new Map();
  private deadLetters: Map<string, WireMessage[]> = new Map();
  private draining: Set<string> = new Set();
  private fatalListeners: FatalErrorListener[] = [];
  private state: QueueClientState = "idle";
  private reachable: boolean = true;

  async connect(): Promise<void> {
    if (!this.reachable) {
      throw new BrokerConnectivityError("In-memory broker is unreachable");
    }
    this.state = "open";
  }

  async consume(
    queue: string,
    handler: DeliveryHandler
  ): Promise<QueueSubscription> {
    this.assertOpen(queue);
    if (this.consumers.has(queue)) {
      throw new BrokerConnectivityError(`Queue ${queue} already has a consumer`);
    }
    this.consumers.set(queue, handler);
    this.scheduleDrain(queue);
    this.debug(`Consuming from ${queue}`);

    return {
      queue,
      cancel: async () => {
        if (this.consumers.get(queue) === handler) {
          this.consumers.delete(queue);
        }
      },
    };
  }

  async send(queue: string, message: WireMessage<string>): Promise<void> {
    if (!this.reachable) {
      throw new BrokerConnectivityError(
        `Broker unreachable, message to ${queue} not sent`
      );
    }
    this.assertOpen(queue);
    this.pending(queue).push({
      properties: { ...message.properties },
      body: message.body,
    });
    this.scheduleDrain(queue);
  }

  async close(): Promise<void> {
    this.consumers.clear();
    this.state = "closed";
  }

  getState(): QueueClientState {
    return this.state;
  }

  onFatal(listener: FatalErrorListener): void {
    this.fatalListeners.push(listener);
  }

  /**
   * Simulates the broker going away (sends fail) or coming back.
   */
  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  /**
   * Simulates a client that ran out of reconnect attempts.
   */
  fail(error: Error): void {
    this.state = "failed";
    this.consumers.clear();
    this.fatalListeners.forEach((listener) => listener(error));
  }

  /**
   * Puts a raw message on a queue, bypassing any codec.
   */
  inject(queue: string, message: WireMessage): void {
    this.pending(queue).push(message);
    this.scheduleDrain(queue);
  }

  queueDepth(queue: string): number {
    return this.queues.get(queue)?.length ?? 0;
  }

  deadLettered(queue: string): WireMessage[] {
    return [...(this.deadLetters.get(queue) ?? [])];
  }

  /**
   * Resolves once no queue is being drained, including queues that became
   * busy because a handler sent further messages.
   */
  async whenIdle(): Promise<void> {
    while (this.draining.size > 0) {
      await new Promise((resolve) => setImmediate(resolve));
    }
  }

  private pending(queue: string): WireMessage[] {
    let messages = this.queues.get(queue);
    if (!messages) {
      messages = [];
      this.queues.set(queue, messages);
    }
    return messages;
  }

  private assertOpen(queue: string): void {
    if (this.state !== "open") {
      throw new BrokerConnectivityError(
        `Queue client is ${this.state}, cannot use ${queue}`
      );
    }
  }

  private scheduleDrain(queue: string): void {
    if (this.draining.has(queue) || !this.consumers.has(queue)) return;
    this.draining.add(queue);
    setImmediate(() => {
      this.drain(queue).catch((error) =>
        this.error(`Draining ${queue} failed`, error)
      );
    });
  }

  private async drain(queue: string): Promise<void> {
    try {
      for (;;) {
        const handler = this.consumers.get(queue);
        const message = handler ? this.queues.get(queue)?.shift() : undefined;
        if (!handler || !message) break;
        try {
          await handler(message);
        } catch (error) {
          this.warn(`Delivery on ${queue} rejected`, error);
          const letters = this.deadLetters.get(queue) ?? [];
          letters.push(message);
          this.deadLetters.set(queue, letters);
        }
      }
    } finally {
      this.draining.delete(queue);
    }
  }
}
