import WebSocket from "ws";
import { request } from "http";
import { Loggable, LogMessage, LogStrategy } from "../logging";

/**
 * Keeps every log line in memory so tests can assert on what was logged.
 */
export class CapturingLogStrategy extends LogStrategy {
  readonly messages: LogMessage[] = [];

  protected async sendPackaged(message: LogMessage): Promise<void> {
    this.messages.push(message);
  }

  at(level: LogMessage["level"]): LogMessage[] {
    return this.messages.filter((message) => message.level === level);
  }

  clear(): void {
    this.messages.length = 0;
  }
}

export async function captureLogs(): Promise<CapturingLogStrategy> {
  await Loggable.flush();
  const strategy = new CapturingLogStrategy();
  Loggable.setLogStrategy(strategy);
  return strategy;
}

export async function waitFor(
  condition: () => boolean,
  timeoutMs: number = 2000
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

export type Frame = Record<string, unknown>;

/**
 * WebSocket client that records every JSON frame it receives.
 */
export class TestClient {
  readonly frames: Frame[] = [];
  closeCode: number | null = null;

  private constructor(private readonly socket: WebSocket) {
    socket.on("close", (code: number) => {
      this.closeCode = code;
    });
    socket.on("message", (data: WebSocket.RawData) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        this.frames.push(Object.fromEntries(Object.entries(parsed)));
      }
    });
  }

  static async connect(url: string): Promise<TestClient> {
    const socket = new WebSocket(url);
    const client = new TestClient(socket);
    await new Promise<void>((resolve, reject) => {
      socket.once("open", () => resolve());
      socket.once("error", reject);
    });
    await waitFor(() => client.framesWith("CONNECTED").length === 1);
    return client;
  }

  send(frame: Frame | string): void {
    this.socket.send(typeof frame === "string" ? frame : JSON.stringify(frame));
  }

  sendBinary(data: Buffer): void {
    this.socket.send(data, { binary: true });
  }

  subscribe(destination: string = "/topic/messages"): void {
    this.send({ command: "SUBSCRIBE", destination });
  }

  sendChat(sender: string, content: string): void {
    this.send({
      command: "SEND",
      destination: "/app/chat.sendMessage",
      body: { sender, content },
    });
  }

  framesWith(command: string): Frame[] {
    return this.frames.filter((frame) => frame.command === command);
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.close();
    });
  }
}

export interface HttpResult {
  status: number;
  contentType: string;
  body: string;
}

export function httpRequest(url: string, method: string = "GET"): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const req = request(url, { method, agent: false }, (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("end", () =>
        resolve({
          status: res.statusCode ?? 0,
          contentType: res.headers["content-type"] ?? "",
          body: Buffer.concat(chunks).toString("utf8"),
        })
      );
      res.on("error", reject);
    });
    req.on("error", reject);
    req.end();
  });
}
