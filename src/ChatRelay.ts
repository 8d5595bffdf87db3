import { IQueueClient } from "./interfaces";
import { Loggable } from "./logging/Loggable";
import { RelayConfig } from "./config/RelayConfig";
import { ChatMessageCodec } from "./core/ChatMessageCodec";
import { Broadcaster } from "./services/Broadcaster";
import { QueuePublisher } from "./services/QueuePublisher";
import { QueueConsumer } from "./services/QueueConsumer";
import { ChatGateway } from "./services/ChatGateway";

export interface ChatRelayOptions {
  pagePath?: string;
  heartbeatInterval?: number;
  maxMessagesPerMinute?: number;
}

/**
 * One relay: consumes `inboundQueue`, fans received messages out to its
 * WebSocket clients and publishes what those clients submit to
 * `outboundQueue`. The queue client is shared and owned by the caller.
 */
export class ChatRelay extends Loggable {
  readonly codec: ChatMessageCodec;
  readonly broadcaster: Broadcaster;
  readonly publisher: QueuePublisher;
  readonly consumer: QueueConsumer;
  readonly gateway: ChatGateway;
  private running: boolean = false;
  private fatalError: Error | null = null;

  constructor(
    private readonly config: RelayConfig,
    private readonly client: IQueueClient,
    options: ChatRelayOptions = {}
  ) {
    super();
    this.codec = new ChatMessageCodec();
    this.broadcaster = new Broadcaster();
    this.publisher = new QueuePublisher(client, this.codec, config.outboundQueue, config.serviceId);
    this.consumer = new QueueConsumer(client, this.codec, this.broadcaster, config.inboundQueue);
    this.gateway = new ChatGateway(
      {
        serviceId: config.serviceId,
        serviceName: config.serviceName,
        port: config.port,
        wsPath: config.wsPath,
        ...options,
      },
      this.broadcaster,
      this.publisher
    );
    this.gateway.setStatusProvider(() => this.getStatus());
    client.onFatal((error) => this.handleFatal(error));
  }

  getServiceId(): string {
    return this.config.serviceId;
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.consumer.start();
    await this.gateway.start();
    this.running = true;
    this.info(
      `Relay ${this.config.serviceId} up: ${this.config.inboundQueue} -> clients, clients -> ${this.config.outboundQueue}`
    );
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.consumer.isConsuming()) {
      await this.consumer.stop();
    }
    await this.gateway.stop();
    this.info(`Relay ${this.config.serviceId} stopped`);
  }

  getStatus() {
    return {
      running: this.running,
      inboundQueue: this.config.inboundQueue,
      outboundQueue: this.config.outboundQueue,
      broker: this.client.getState(),
      consuming: this.consumer.isConsuming(),
      consumer: this.consumer.getStats(),
      published: this.publisher.getPublishedCount(),
      publishFailures: this.publisher.getFailedCount(),
      fatalError: this.fatalError?.message ?? null,
    };
  }

  // The gateway keeps serving; local echo still works without a broker.
  private handleFatal(error: Error): void {
    this.fatalError = error;
    this.consumer.abandon();
    this.error(`Relay ${this.config.serviceId} lost its broker connection for good`, {
      error: error.message,
    });
  }
}
