import { IChatMessage, IQueueClient, QueueSubscription, WireMessage } from "../interfaces";
import { RateLimitedTaskScheduler } from "../core/RateLimitedTaskScheduler";
import { ChatMessageCodec } from "../core/ChatMessageCodec";
import { DecodeError } from "../core/errors";
import { chatMessageToJSON } from "../core/ChatMessage";
import { Broadcaster } from "./Broadcaster";

/**
 * Listens on one inbound queue and hands every decoded message to the
 * broadcaster. Deliveries run one at a time, in arrival order.
 *
 * A payload that does not decode is logged and dropped. Anything else that
 * goes wrong fails the delivery, which the queue client rejects.
 */
export class QueueConsumer extends RateLimitedTaskScheduler<WireMessage, IChatMessage | null> {
  private subscription: QueueSubscription | null = null;
  private receivedCount: number = 0;
  private discardedCount: number = 0;

  constructor(
    private readonly client: IQueueClient,
    private readonly codec: ChatMessageCodec,
    private readonly broadcaster: Broadcaster,
    private readonly inboundQueue: string
  ) {
    super(1);
  }

  async start(): Promise<void> {
    if (this.subscription) return;
    this.subscription = await this.client.consume(
      this.inboundQueue,
      this.handleDelivery.bind(this)
    );
    this.info(`Consuming from ${this.inboundQueue}`);
  }

  async stop(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      await subscription.cancel();
    }
    await this.whenIdle();
    this.destroy();
    this.info(`Stopped consuming from ${this.inboundQueue}`);
  }

  /**
   * Drops the subscription reference without talking to the client, for when
   * the client has already given up on the connection.
   */
  abandon(): void {
    this.subscription = null;
  }

  isConsuming(): boolean {
    return this.subscription !== null;
  }

  getInboundQueue(): string {
    return this.inboundQueue;
  }

  getStats() {
    return {
      received: this.receivedCount,
      broadcast: this.processedTaskCount() - this.discardedCount,
      discarded: this.discardedCount,
    };
  }

  private async handleDelivery(wire: WireMessage): Promise<void> {
    this.receivedCount++;
    const output = await this.runTask(this.decodeAndBroadcast.bind(this), wire);
    if (!output.success) {
      throw output.error ?? new Error(`Delivery from ${this.inboundQueue} failed`);
    }
  }

  private async decodeAndBroadcast(wire: WireMessage): Promise<IChatMessage | null> {
    let message: IChatMessage;
    try {
      message = this.codec.decode(wire);
    } catch (error) {
      if (error instanceof DecodeError) {
        this.discardedCount++;
        this.error(`Discarding undecodable message from ${this.inboundQueue}`, error.toJSON());
        return null;
      }
      throw error;
    }

    this.debug(`Received from ${this.inboundQueue}`, chatMessageToJSON(message));
    this.broadcaster.deliver(message);
    return message;
  }
}
