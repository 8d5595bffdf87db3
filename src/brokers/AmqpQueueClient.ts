import { create_container } from "rhea";
import type {
  Connection,
  ConnectionOptions,
  EventContext,
  Message,
  Receiver,
  Sender,
} from "rhea";
import {
  DeliveryHandler,
  FatalErrorListener,
  IQueueClient,
  QueueClientState,
  QueueSubscription,
  WireMessage,
  WireProperties,
} from "../interfaces";
import { Loggable } from "../logging/Loggable";
import { BrokerConnectivityError } from "../core/errors";
import { BrokerConfig } from "../config/RelayConfig";

const SENDABLE_TIMEOUT_MS = 5000;
const CLOSE_TIMEOUT_MS = 2000;

/**
 * Maps the broker settings onto rhea's reconnect options. rhea doubles the
 * delay between attempts up to `max_reconnect_delay`, so the multiplier only
 * decides that ceiling; a multiplier of 1 gives a fixed delay.
 */
export function buildConnectionOptions(
  config: BrokerConfig,
  containerId: string
): ConnectionOptions {
  const base: ConnectionOptions = {
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    container_id: containerId,
    reconnect_limit: config.reconnectAttempts,
  };

  if (config.reconnectAttempts === 0) {
    return { ...base, reconnect: false };
  }
  if (config.retryMultiplier <= 1) {
    return { ...base, reconnect: config.retryInterval };
  }
  return {
    ...base,
    reconnect: true,
    initial_reconnect_delay: config.retryInterval,
    max_reconnect_delay: Math.round(
      config.retryInterval *
        Math.pow(config.retryMultiplier, Math.max(config.reconnectAttempts - 1, 0))
    ),
  };
}

/**
 * Copies the application properties that fit the wire model.
 */
export function toWireMessage(message: Message): WireMessage {
  const properties: WireProperties = {};
  for (const [key, value] of Object.entries(message.application_properties ?? {})) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      properties[key] = value;
    }
  }

  // A data section arrives as { typecode, content: Buffer }.
  const body: unknown = message.body;
  if (
    typeof body === "object" &&
    body !== null &&
    "typecode" in body &&
    "content" in body &&
    Buffer.isBuffer(body.content)
  ) {
    return { properties, body: body.content };
  }
  return { properties, body };
}

interface ReceiverState {
  receiver: Receiver;
  processing: boolean;
  cancelled: boolean;
}

/**
 * AMQP 1.0 queue client on rhea. One connection per client; one receiver per
 * consumed queue, holding a single credit so the broker hands out the next
 * message only after the previous handler settled; one cached sender per
 * outbound queue.
 */
export class AmqpQueueClient extends Loggable implements IQueueClient {
  private connection: Connection | null = null;
  private senders: Map<string, Sender> = new Map();
  private receivers: Map<string, ReceiverState> = new Map();
  private fatalListeners: FatalErrorListener[] = [];
  private state: QueueClientState = "idle";
  private failedAttempts: number = 0;
  private closing: boolean = false;

  constructor(
    private readonly config: BrokerConfig,
    private readonly containerId: string
  ) {
    super();
  }

  connect(): Promise<void> {
    if (this.connection) {
      return Promise.reject(
        new BrokerConnectivityError("Queue client already connected")
      );
    }

    this.state = "connecting";
    const container = create_container({ id: this.containerId });
    const connection = container.connect(
      buildConnectionOptions(this.config, this.containerId)
    );
    this.connection = connection;

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      connection.on("connection_open", () => {
        this.failedAttempts = 0;
        this.state = "open";
        this.info(
          `Connected to broker at ${this.config.host}:${this.config.port}`
        );
        if (!settled) {
          settled = true;
          resolve();
        }
      });

      connection.on("connection_error", (context: EventContext) => {
        this.error("Broker connection error", describeError(context));
      });

      connection.on("error", (error: unknown) => {
        this.error("Broker protocol error", error);
      });

      connection.on("disconnected", (context: EventContext) => {
        if (this.closing) return;
        this.failedAttempts++;
        if (this.failedAttempts > this.config.reconnectAttempts) {
          const error = new BrokerConnectivityError(
            `Broker at ${this.config.host}:${this.config.port} unreachable after ${this.config.reconnectAttempts} reconnect attempts`,
            describeError(context)
          );
          this.state = "failed";
          this.error(error);
          this.fatalListeners.forEach((listener) => listener(error));
          if (!settled) {
            settled = true;
            reject(error);
          }
          return;
        }
        this.state = "reconnecting";
        this.warn(
          `Disconnected from broker, reconnect attempt ${this.failedAttempts}/${this.config.reconnectAttempts}`,
          describeError(context)
        );
      });
    });
  }

  async consume(
    queue: string,
    handler: DeliveryHandler
  ): Promise<QueueSubscription> {
    const connection = this.requireConnection(queue);
    if (this.receivers.has(queue)) {
      throw new BrokerConnectivityError(`Queue ${queue} already has a consumer`);
    }

    const receiver = connection.open_receiver({
      source: { address: queue },
      credit_window: 0,
      autoaccept: false,
    });
    const state: ReceiverState = { receiver, processing: false, cancelled: false };
    this.receivers.set(queue, state);

    receiver.on("receiver_open", () => {
      this.debug(`Receiver attached to ${queue}`);
      if (!state.processing && !state.cancelled) {
        receiver.add_credit(1);
      }
    });

    receiver.on("message", (context: EventContext) => {
      this.handleDelivery(queue, state, handler, context).catch((error) =>
        this.error(`Settling delivery from ${queue} failed`, error)
      );
    });

    return {
      queue,
      cancel: async () => {
        state.cancelled = true;
        this.receivers.delete(queue);
        receiver.close();
      },
    };
  }

  async send(queue: string, message: WireMessage<string>): Promise<void> {
    if (this.state !== "open") {
      throw new BrokerConnectivityError(
        `Broker connection is ${this.state}, message to ${queue} not sent`
      );
    }
    const sender = this.senderFor(queue);
    if (!sender.sendable()) {
      await this.waitUntilSendable(queue, sender);
    }

    try {
      sender.send({
        body: message.body,
        application_properties: { ...message.properties },
        durable: true,
      });
    } catch (error) {
      throw new BrokerConnectivityError(
        `Failed to send message to ${queue}`,
        { queue },
        error instanceof Error ? error : undefined
      );
    }
  }

  close(): Promise<void> {
    const connection = this.connection;
    this.closing = true;
    this.state = "closed";
    this.connection = null;
    this.senders.clear();
    this.receivers.clear();
    if (!connection || !connection.is_open()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const timeout = setTimeout(resolve, CLOSE_TIMEOUT_MS);
      connection.once("connection_close", () => {
        clearTimeout(timeout);
        resolve();
      });
      connection.close();
    });
  }

  getState(): QueueClientState {
    return this.state;
  }

  onFatal(listener: FatalErrorListener): void {
    this.fatalListeners.push(listener);
  }

  private async handleDelivery(
    queue: string,
    state: ReceiverState,
    handler: DeliveryHandler,
    context: EventContext
  ): Promise<void> {
    const { message, delivery } = context;
    if (!message || !delivery) return;

    state.processing = true;
    try {
      await handler(toWireMessage(message));
      delivery.accept();
    } catch (error) {
      this.warn(`Rejecting delivery from ${queue}`, error);
      delivery.reject({
        condition: "amqp:internal-error",
        description: error instanceof Error ? error.message : String(error),
      });
    } finally {
      state.processing = false;
      if (!state.cancelled) {
        state.receiver.add_credit(1);
      }
    }
  }

  private senderFor(queue: string): Sender {
    const existing = this.senders.get(queue);
    if (existing) return existing;

    const sender = this.requireConnection(queue).open_sender({
      target: { address: queue },
    });
    sender.on("rejected", (context: EventContext) => {
      this.warn(`Broker rejected a message to ${queue}`, describeError(context));
    });
    sender.on("released", () => {
      this.warn(`Broker released a message to ${queue}`);
    });
    this.senders.set(queue, sender);
    return sender;
  }

  private waitUntilSendable(queue: string, sender: Sender): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onSendable = () => {
        clearTimeout(timeout);
        resolve();
      };
      const timeout = setTimeout(() => {
        sender.removeListener("sendable", onSendable);
        reject(
          new BrokerConnectivityError(
            `No link credit for ${queue} after ${SENDABLE_TIMEOUT_MS}ms`
          )
        );
      }, SENDABLE_TIMEOUT_MS);
      sender.once("sendable", onSendable);
    });
  }

  private requireConnection(queue: string): Connection {
    if (!this.connection || this.state === "failed" || this.state === "closed") {
      throw new BrokerConnectivityError(
        `Broker connection is ${this.state}, cannot use ${queue}`
      );
    }
    return this.connection;
  }
}

function describeError(context: EventContext): unknown {
  return context.error;
}
