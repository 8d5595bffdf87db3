import { IChatMessage, IQueueClient } from "../interfaces";
import { Loggable } from "../logging/Loggable";
import { ChatMessageCodec } from "../core/ChatMessageCodec";
import { withService } from "../core/ChatMessage";
import { BrokerConnectivityError } from "../core/errors";

/**
 * Encodes chat messages and hands them to the broker. Best effort: there is
 * no outbox and no retry beyond what the queue client does on its own.
 */
export class QueuePublisher extends Loggable {
  private publishedCount: number = 0;
  private failedCount: number = 0;

  constructor(
    private readonly client: IQueueClient,
    private readonly codec: ChatMessageCodec,
    private readonly outboundQueue: string,
    private readonly serviceId: string
  ) {
    super();
  }

  /**
   * Publishes to the outbound queue. A message without a `service` tag is
   * stamped with this relay's identity; an existing tag is kept.
   *
   * @throws BrokerConnectivityError when the client cannot take the message.
   */
  async publish(message: IChatMessage): Promise<IChatMessage> {
    const stamped = message.service ? message : withService(message, this.serviceId);
    const wire = this.codec.encode(stamped);

    try {
      await this.client.send(this.outboundQueue, wire);
    } catch (error) {
      this.failedCount++;
      const publishError =
        error instanceof BrokerConnectivityError
          ? error
          : new BrokerConnectivityError(
              `Publishing to ${this.outboundQueue} failed`,
              { queue: this.outboundQueue },
              error instanceof Error ? error : undefined
            );
      this.error(`Message from ${stamped.sender} not published to ${this.outboundQueue}`, publishError.toJSON());
      throw publishError;
    }

    this.publishedCount++;
    this.debug(`Published to ${this.outboundQueue}`, wire.body);
    return stamped;
  }

  getOutboundQueue(): string {
    return this.outboundQueue;
  }

  getPublishedCount(): number {
    return this.publishedCount;
  }

  getFailedCount(): number {
    return this.failedCount;
  }
}
