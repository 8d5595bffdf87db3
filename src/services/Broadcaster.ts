import EventEmitter from "eventemitter3";
import { IChatMessage } from "../interfaces";
import { Loggable } from "../logging/Loggable";
import { chatMessageToJSON } from "../core/ChatMessage";

export const MESSAGES_TOPIC = "/topic/messages";

/**
 * Receives every message published on a channel it subscribed to.
 */
export interface ISubscriber {
  readonly id: string;
  deliver(channel: string, message: IChatMessage): void;
}

type ChannelListener = (message: IChatMessage) => void;

/**
 * In-process fan-out. Every subscriber of a channel gets each message once;
 * late subscribers get nothing from before they joined. A subscriber that
 * throws is logged and skipped.
 */
export class Broadcaster extends Loggable {
  private emitter = new EventEmitter<Record<string, [IChatMessage]>>();
  private listeners: Map<string, Map<string, ChannelListener>> = new Map();
  private deliveredCount: number = 0;

  constructor(private readonly defaultChannel: string = MESSAGES_TOPIC) {
    super();
  }

  /**
   * Sends the message to every subscriber of the channel. Returns how many
   * subscribers it was handed to.
   */
  deliver(message: IChatMessage, channel: string = this.defaultChannel): number {
    const receivers = this.emitter.listenerCount(channel);
    this.emitter.emit(channel, message);
    this.deliveredCount++;
    this.debug(`Delivered to ${receivers} subscriber(s) on ${channel}`, chatMessageToJSON(message));
    return receivers;
  }

  subscribe(channel: string, subscriber: ISubscriber): void {
    let channels = this.listeners.get(subscriber.id);
    if (!channels) {
      channels = new Map();
      this.listeners.set(subscriber.id, channels);
    }
    if (channels.has(channel)) return;

    const listener: ChannelListener = (message) => {
      try {
        subscriber.deliver(channel, message);
      } catch (error) {
        this.warn(`Subscriber ${subscriber.id} failed on ${channel}`, error);
      }
    };
    channels.set(channel, listener);
    this.emitter.on(channel, listener);
  }

  unsubscribe(channel: string, subscriberId: string): void {
    const channels = this.listeners.get(subscriberId);
    const listener = channels?.get(channel);
    if (!channels || !listener) return;

    this.emitter.off(channel, listener);
    channels.delete(channel);
    if (channels.size === 0) {
      this.listeners.delete(subscriberId);
    }
  }

  unsubscribeAll(subscriberId: string): void {
    const channels = this.listeners.get(subscriberId);
    if (!channels) return;
    for (const [channel, listener] of channels) {
      this.emitter.off(channel, listener);
    }
    this.listeners.delete(subscriberId);
  }

  isSubscribed(channel: string, subscriberId: string): boolean {
    return this.listeners.get(subscriberId)?.has(channel) ?? false;
  }

  subscriberCount(channel: string = this.defaultChannel): number {
    return this.emitter.listenerCount(channel);
  }

  getDeliveredCount(): number {
    return this.deliveredCount;
  }

  getDefaultChannel(): string {
    return this.defaultChannel;
  }
}
