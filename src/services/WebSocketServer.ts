import { Server } from "ws";
import { createServer, IncomingMessage, Server as HttpServer, ServerResponse } from "http";
import { Duplex } from "stream";
import { Loggable } from "../logging/Loggable";
import { ConnectionEvents, WebsocketConnection } from "./WebsocketConnection";

export interface WebSocketServerConfig {
  port: number;
  path?: string;
  maxConnections?: number;
  maxMessagesPerMinute?: number;
  heartbeatInterval?: number;
}

export type HttpResponse = {
  statusCode: number;
  headers?: Record<string, string>;
  body: string | object;
};

/**
 * HTTP server with a WebSocket endpoint on one path. Subclasses answer plain
 * HTTP requests and handle the text frames of each connection.
 */
export abstract class WebSocketServer extends Loggable {
  private server: HttpServer;
  private wss: Server;
  private connections: Map<string, WebsocketConnection> = new Map();
  private port: number;
  protected readonly path: string;
  private maxConnections: number;
  private maxMessagesPerMinute: number;
  private heartbeatInterval: number;
  private listening: boolean = false;

  constructor(config: WebSocketServerConfig) {
    super();
    this.port = config.port;
    this.path = config.path || "/ws";
    this.maxConnections = config.maxConnections || 1000;
    this.maxMessagesPerMinute = config.maxMessagesPerMinute || 100;
    this.heartbeatInterval = config.heartbeatInterval ?? 30000;
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        this.error(`Error processing request ${req.method} ${req.url}`, error);
        if (!res.headersSent) {
          this.sendResponse(res, { statusCode: 500, body: { error: "Internal Server Error" } });
        }
      });
    });
    this.wss = new Server({ noServer: true, maxPayload: WebsocketConnection.MAX_MESSAGE_SIZE });

    this.server.on("error", (error) => {
      this.error(`Server error: ${error.message}`, error);
    });

    this.setupWebSocketServer();
  }

  protected abstract handleMessage(data: string, connection: WebsocketConnection): void;

  protected abstract handleHttpRequest(
    method: string,
    pathname: string,
    req: IncomingMessage
  ): Promise<HttpResponse>;

  protected onConnection(connection: WebsocketConnection): void {}

  protected onDisconnect(connectionId: string): void {}

  private setupWebSocketServer() {
    this.server.on(
      "upgrade",
      (request: IncomingMessage, socket: Duplex, head: Buffer) => {
        socket.on("error", (err) => {
          this.error("Socket error:", err);
          socket.destroy();
        });

        const url = new URL(request.url ?? "/", `http://${request.headers.host ?? "localhost"}`);

        if (url.pathname !== this.path) {
          socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
          socket.destroy();
          this.warn(`Invalid path: ${request.url}`);
          return;
        }

        this.wss.handleUpgrade(request, socket, head, (ws) => {
          if (this.connections.size >= this.maxConnections) {
            ws.close(1013, "Maximum number of connections reached");
            return;
          }

          const connection = new WebsocketConnection(
            ws,
            this.handleMessage.bind(this),
            this.handleClose.bind(this),
            this.handleWsEvents(),
            {
              maxMessagesPerMinute: this.maxMessagesPerMinute,
              heartbeatInterval: this.heartbeatInterval,
            }
          );
          this.connections.set(connection.getConnectionId(), connection);
          this.debug(`WebSocket connection opened: ${connection.getConnectionId()}`);
          this.onConnection(connection);
        });
      }
    );
  }

  private handleWsEvents(): ConnectionEvents {
    return {
      onRateLimit: (connectionId: string) => {
        this.warn(`Rate limit exceeded for connection ${connectionId}`);
        this.dropConnection(connectionId, 1008, "Rate limit exceeded");
      },
      onError: (connectionId: string, error: Error) => {
        this.warn(`Error for connection ${connectionId}: ${error.message}`);
      },
      onSecurityViolation: (connectionId: string, violation: string) => {
        this.warn(`Security violation for connection ${connectionId}: ${violation}`);
        this.dropConnection(connectionId, 1008, "Security violation");
      },
    };
  }

  private dropConnection(connectionId: string, code: number, reason: string) {
    const connection = this.connections.get(connectionId);
    if (connection) {
      this.connections.delete(connectionId);
      this.onDisconnect(connectionId);
      connection.close(code, reason).catch((error) =>
        this.error(`Closing connection ${connectionId} failed`, error)
      );
    }
  }

  private handleClose(connectionId: string) {
    if (this.connections.delete(connectionId)) {
      this.onDisconnect(connectionId);
      this.debug(`WebSocket connection closed: ${connectionId}`);
    }
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse) {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const response = await this.handleHttpRequest(req.method ?? "GET", url.pathname, req);
    this.sendResponse(res, response);
  }

  protected sendResponse(res: ServerResponse, response: HttpResponse) {
    const isText = typeof response.body === "string";
    const payload = isText ? String(response.body) : JSON.stringify(response.body);
    res.writeHead(response.statusCode, {
      "Content-Type": isText ? "text/plain; charset=utf-8" : "application/json",
      "X-Content-Type-Options": "nosniff",
      "X-Frame-Options": "DENY",
      "Cache-Control": "no-cache",
      "Content-Length": Buffer.byteLength(payload).toString(),
      ...response.headers,
    });
    res.end(payload);
  }

  public connectionCount(): number {
    return this.connections.size;
  }

  /**
   * The bound port; differs from the configured one when that was 0.
   */
  public getPort(): number {
    const address = this.server.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.port;
  }

  public isListening(): boolean {
    return this.listening;
  }

  @Loggable.handleErrors
  async start(): Promise<void> {
    if (this.listening) return;
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once("error", onError);
      this.server.listen(this.port, () => {
        this.server.off("error", onError);
        resolve();
      });
    });
    this.listening = true;
    this.info(`WebSocket server listening on port ${this.getPort()} (path ${this.path})`);
  }

  @Loggable.handleErrors
  async stop(): Promise<void> {
    if (!this.listening) return;
    this.listening = false;

    const serverClosed = new Promise<void>((resolve) => this.server.close(() => resolve()));

    this.info("Closing all active WebSocket connections...");
    const connections = Array.from(this.connections.values());
    this.connections.clear();
    await Promise.all(
      connections.map((connection) => connection.close(1001, "Server shutting down"))
    );

    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    this.server.closeAllConnections();
    await serverClosed;
    this.info("WebSocket server stopped");
  }
}
