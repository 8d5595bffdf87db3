import { IncomingMessage } from "http";
import { readFile } from "fs/promises";
import path from "path";
import { ChatMessageJSON, IChatMessage } from "../interfaces";
import { chatMessageToJSON, createChatMessage, isChatSubmission } from "../core/ChatMessage";
import { HttpResponse, WebSocketServer } from "./WebSocketServer";
import { WebsocketConnection } from "./WebsocketConnection";
import { Broadcaster, ISubscriber } from "./Broadcaster";
import { QueuePublisher } from "./QueuePublisher";

export const SEND_DESTINATION = "/app/chat.sendMessage";

export const DEFAULT_PAGE_PATH = path.resolve(__dirname, "../../public/chat.html");

export type ClientFrame =
  | { command: "SUBSCRIBE"; destination: string }
  | { command: "UNSUBSCRIBE"; destination: string }
  | { command: "SEND"; destination: string; body: unknown };

export type ServerFrame =
  | { command: "CONNECTED"; connectionId: string; service: string }
  | { command: "MESSAGE"; destination: string; body: ChatMessageJSON }
  | { command: "ERROR"; message: string };

export interface ChatGatewayConfig {
  serviceId: string;
  serviceName: string;
  port: number;
  wsPath: string;
  pagePath?: string;
  maxMessagesPerMinute?: number;
  heartbeatInterval?: number;
}

export type StatusProvider = () => object;

/**
 * Parses one client frame. Returns an error text for anything that is not a
 * frame this gateway understands.
 */
export function parseClientFrame(data: string): ClientFrame | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return "Malformed frame: not valid JSON";
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return "Malformed frame: expected a JSON object";
  }
  const command = "command" in parsed ? parsed.command : undefined;
  const destination = "destination" in parsed ? parsed.destination : undefined;
  if (typeof destination !== "string") {
    return `Frame ${String(command)} needs a destination`;
  }
  switch (command) {
    case "SUBSCRIBE":
    case "UNSUBSCRIBE":
      return { command, destination };
    case "SEND":
      return { command, destination, body: "body" in parsed ? parsed.body : undefined };
    default:
      return `Unknown command "${String(command)}"`;
  }
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function messageFrame(channel: string, message: IChatMessage): string {
  const frame: ServerFrame = {
    command: "MESSAGE",
    destination: channel,
    body: chatMessageToJSON(message),
  };
  return JSON.stringify(frame);
}

class ConnectionSubscriber implements ISubscriber {
  constructor(private readonly connection: WebsocketConnection) {}

  get id(): string {
    return this.connection.getConnectionId();
  }

  deliver(channel: string, message: IChatMessage): void {
    this.connection.send(messageFrame(channel, message));
  }
}

/**
 * WebSocket face of a relay. Clients subscribe to the message topic and
 * submit chat lines; each accepted line is echoed locally and published to the
 * peer relay. The same port serves the chat page and a status document.
 */
export class ChatGateway extends WebSocketServer {
  private readonly serviceId: string;
  private readonly serviceName: string;
  private readonly pagePath: string;
  private pageTemplate: string | null = null;
  private statusProvider: StatusProvider = () => ({});
  private acceptedCount: number = 0;
  private rejectedCount: number = 0;

  constructor(
    config: ChatGatewayConfig,
    private readonly broadcaster: Broadcaster,
    private readonly publisher: QueuePublisher
  ) {
    super({
      port: config.port,
      path: config.wsPath,
      maxMessagesPerMinute: config.maxMessagesPerMinute,
      heartbeatInterval: config.heartbeatInterval,
    });
    this.serviceId = config.serviceId;
    this.serviceName = config.serviceName;
    this.pagePath = config.pagePath ?? DEFAULT_PAGE_PATH;
  }

  setStatusProvider(provider: StatusProvider): void {
    this.statusProvider = provider;
  }

  getStats() {
    return {
      clients: this.connectionCount(),
      subscribers: this.broadcaster.subscriberCount(),
      accepted: this.acceptedCount,
      rejected: this.rejectedCount,
    };
  }

  /**
   * Echoes a submission to local subscribers and publishes it. The returned
   * promise settles once the publish attempt is over; a failed publish is
   * logged and does not reject. Resolves to null for a rejected submission.
   */
  async submit(submission: unknown): Promise<IChatMessage | null> {
    const message = this.accept(submission);
    if (typeof message === "string") return null;
    await this.relay(message);
    return message;
  }

  /**
   * Stamps a valid submission, or returns the reason it was refused. The
   * MESSAGE frame carrying it must fit the socket frame limit.
   */
  private accept(submission: unknown): IChatMessage | string {
    if (!isChatSubmission(submission)) {
      this.rejectedCount++;
      return "A message needs a non-empty content and sender";
    }
    const message = createChatMessage(submission, this.serviceId);
    const frame = messageFrame(this.broadcaster.getDefaultChannel(), message);
    if (Buffer.byteLength(frame) > WebsocketConnection.MAX_MESSAGE_SIZE) {
      this.rejectedCount++;
      return `Message too large: its frame would exceed ${WebsocketConnection.MAX_MESSAGE_SIZE} bytes`;
    }
    this.acceptedCount++;
    return message;
  }

  private async relay(message: IChatMessage): Promise<void> {
    this.broadcaster.deliver(message);
    try {
      await this.publisher.publish(message);
    } catch (error) {
      this.warn(`Message from ${message.sender} was echoed but not relayed`, error);
    }
  }

  protected onConnection(connection: WebsocketConnection): void {
    this.sendFrame(connection, {
      command: "CONNECTED",
      connectionId: connection.getConnectionId(),
      service: this.serviceId,
    });
  }

  protected onDisconnect(connectionId: string): void {
    this.broadcaster.unsubscribeAll(connectionId);
  }

  protected handleMessage(data: string, connection: WebsocketConnection): void {
    const frame = parseClientFrame(data);
    if (typeof frame === "string") {
      this.sendError(connection, frame);
      return;
    }

    switch (frame.command) {
      case "SUBSCRIBE":
        if (frame.destination !== this.broadcaster.getDefaultChannel()) {
          this.sendError(connection, `Unknown destination "${frame.destination}"`);
          return;
        }
        this.broadcaster.subscribe(frame.destination, new ConnectionSubscriber(connection));
        this.debug(`${connection.getConnectionId()} subscribed to ${frame.destination}`);
        return;
      case "UNSUBSCRIBE":
        this.broadcaster.unsubscribe(frame.destination, connection.getConnectionId());
        return;
      case "SEND": {
        if (frame.destination !== SEND_DESTINATION) {
          this.sendError(connection, `Unknown destination "${frame.destination}"`);
          return;
        }
        const message = this.accept(frame.body);
        if (typeof message === "string") {
          this.sendError(connection, message);
          return;
        }
        this.relay(message).catch((error) =>
          this.error(`Submission from ${connection.getConnectionId()} failed`, error)
        );
        return;
      }
    }
  }

  protected async handleHttpRequest(
    method: string,
    pathname: string,
    req: IncomingMessage
  ): Promise<HttpResponse> {
    if (method !== "GET" && method !== "HEAD") {
      return { statusCode: 405, headers: { Allow: "GET, HEAD" }, body: { error: "Method Not Allowed" } };
    }

    if (pathname === "/" || pathname === `/${this.serviceId}`) {
      return {
        statusCode: 200,
        headers: { "Content-Type": "text/html; charset=utf-8" },
        body: await this.renderPage(),
      };
    }

    if (pathname === "/status") {
      return {
        statusCode: 200,
        body: {
          service: this.serviceId,
          serviceName: this.serviceName,
          ...this.statusProvider(),
          gateway: this.getStats(),
        },
      };
    }

    this.debug(`No route for ${method} ${pathname}`, { userAgent: req.headers["user-agent"] });
    return { statusCode: 404, body: { error: "Not Found" } };
  }

  private async renderPage(): Promise<string> {
    if (this.pageTemplate === null) {
      this.pageTemplate = await readFile(this.pagePath, "utf8");
    }
    const values: Record<string, string> = {
      serviceName: escapeHtml(this.serviceName),
      wsPath: escapeHtml(this.path),
    };
    return this.pageTemplate.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
  }

  private sendError(connection: WebsocketConnection, message: string): void {
    this.sendFrame(connection, { command: "ERROR", message });
  }

  private sendFrame(connection: WebsocketConnection, frame: ServerFrame): void {
    connection.send(JSON.stringify(frame));
  }
}
