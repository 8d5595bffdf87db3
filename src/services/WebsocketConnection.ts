import WebSocket from "ws";
import { v4 as uuidv4 } from "uuid";

export interface ConnectionEvents {
  onRateLimit: (connectionId: string) => void;
  onError: (connectionId: string, error: Error) => void;
  onSecurityViolation: (connectionId: string, violation: string) => void;
}

export interface ConnectionOptions {
  maxMessagesPerMinute?: number;
  /** 0 disables the ping/pong heartbeat. */
  heartbeatInterval?: number;
}

type MessageHandler = (data: string, connection: WebsocketConnection) => void;

export class WebsocketConnection {
  static readonly MAX_MESSAGE_SIZE = 1024 * 1024; // 1MB
  private static readonly FORCED_CLOSE_TIMEOUT = 5000;
  private static readonly RATE_WINDOW = 60000;

  private readonly connectionId: string = uuidv4();
  private windowStart: number = Date.now();
  private messagesInWindow: number = 0;
  private awaitingPong: boolean = false;
  private heartbeatTimer?: NodeJS.Timeout;
  private closePromise: Promise<void> | null = null;
  private readonly maxMessagesPerMinute: number;

  constructor(
    private readonly websocket: WebSocket,
    private readonly handleMessage: MessageHandler,
    private readonly handleClose: (connectionId: string) => void,
    private readonly events: ConnectionEvents,
    options: ConnectionOptions = {}
  ) {
    this.maxMessagesPerMinute = options.maxMessagesPerMinute ?? 100;
    this.setupEventListeners();
    const heartbeatInterval = options.heartbeatInterval ?? 30000;
    if (heartbeatInterval > 0) {
      this.startHeartbeat(heartbeatInterval);
    }
  }

  private setupEventListeners() {
    this.websocket.on("message", (data: WebSocket.RawData, isBinary: boolean) =>
      this.handleWebsocketMessage(data, isBinary)
    );
    this.websocket.on("close", () => this.handleCloseConnection());
    this.websocket.on("pong", () => {
      this.awaitingPong = false;
    });
    this.websocket.on("error", (error: Error) => {
      this.events.onError(this.connectionId, error);
    });
  }

  // A peer that has not answered the previous ping is considered gone.
  private startHeartbeat(interval: number) {
    this.heartbeatTimer = setInterval(() => {
      if (!this.isConnected()) return;
      if (this.awaitingPong) {
        this.events.onError(this.connectionId, new Error("Heartbeat timeout"));
        this.websocket.terminate();
        return;
      }
      this.awaitingPong = true;
      this.websocket.ping();
    }, interval);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat() {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  private handleWebsocketMessage(data: WebSocket.RawData, isBinary: boolean) {
    if (isBinary) {
      this.events.onSecurityViolation(this.connectionId, "Binary frames are not accepted");
      return;
    }

    if (this.getDataSize(data) > WebsocketConnection.MAX_MESSAGE_SIZE) {
      this.events.onSecurityViolation(this.connectionId, "Message size exceeded");
      return;
    }

    if (this.isRateLimited()) {
      this.events.onRateLimit(this.connectionId);
      return;
    }

    try {
      this.handleMessage(this.dataToString(data), this);
    } catch (error) {
      this.events.onError(
        this.connectionId,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  private handleCloseConnection() {
    this.stopHeartbeat();
    this.handleClose(this.connectionId);
  }

  private isRateLimited(): boolean {
    const now = Date.now();
    if (now - this.windowStart >= WebsocketConnection.RATE_WINDOW) {
      this.windowStart = now;
      this.messagesInWindow = 0;
    }
    this.messagesInWindow++;
    return this.messagesInWindow > this.maxMessagesPerMinute;
  }

  private dataToString(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) {
      return data.toString("utf8");
    }
    if (Array.isArray(data)) {
      return Buffer.concat(data).toString("utf8");
    }
    return Buffer.from(data).toString("utf8");
  }

  private getDataSize(data: WebSocket.RawData): number {
    if (Array.isArray(data)) {
      return data.reduce((acc, buf) => acc + buf.length, 0);
    }
    return data.byteLength;
  }

  /**
   * Sends a text frame. Returns false when the socket is no longer open.
   */
  public send(message: string): boolean {
    if (!this.isConnected()) {
      return false;
    }
    if (Buffer.byteLength(message) > WebsocketConnection.MAX_MESSAGE_SIZE) {
      throw new Error("Message exceeds maximum size limit");
    }
    this.websocket.send(message);
    return true;
  }

  public close(code?: number, reason?: string): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = new Promise<void>((resolve) => {
        this.stopHeartbeat();

        if (this.websocket.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }

        const timeoutId = setTimeout(() => {
          this.websocket.terminate();
          resolve();
        }, WebsocketConnection.FORCED_CLOSE_TIMEOUT);

        this.websocket.once("close", () => {
          clearTimeout(timeoutId);
          resolve();
        });

        this.websocket.close(code, reason);
      });
    }

    return this.closePromise;
  }

  public isConnected(): boolean {
    return this.websocket.readyState === WebSocket.OPEN;
  }

  public getConnectionId(): string {
    return this.connectionId;
  }
}
