export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = keyof typeof LogLevel;

/**
 * Type representing the payload type of a log message.
 */
export type PayloadType = "text" | "json";

/**
 * Interface representing the payload of a log message.
 */
export interface LogPayload {
  /** The type of the payload. */
  type: PayloadType;
  /** The content of the payload. */
  content: unknown;
}

/**
 * Interface representing a log message.
 */
export interface LogMessage {
  sender?: string;
  /** The timestamp of the log message. */
  timestamp: string;
  /** The log level of the message. */
  level: LogLevelName;
  /** The content of the log message. */
  message: string;
  /** Optional payload for additional information. */
  payload?: LogPayload;
}

export abstract class LogStrategy {
  protected MAX_STRING_LENGTH = 5000;
  protected MAX_DEPTH = 10;

  protected abstract sendPackaged(message: LogMessage): Promise<void>;

  /**
   * Truncates the payload to the strategy's limits and hands the message on.
   */
  async send(message: LogMessage): Promise<void> {
    await this.sendPackaged({
      ...message,
      payload: message.payload && {
        type: message.payload.type,
        content: LogStrategy.truncateAndStringify(
          message.payload.content,
          0,
          this.MAX_STRING_LENGTH,
          this.MAX_DEPTH
        ),
      },
    });
  }

  static truncateAndStringify(
    value: unknown,
    depth: number = 0,
    maxStringLength = 5000,
    maxDepth = 10
  ): unknown {
    if (depth > maxDepth) {
      return "[Object depth limit exceeded]";
    }

    if (value === undefined || value === null) {
      return value;
    }

    if (typeof value === "string") {
      return value.length > maxStringLength
        ? value.substring(0, maxStringLength) + "..."
        : value;
    }

    if (typeof value === "number" || typeof value === "boolean") {
      return value;
    }

    if (value instanceof Date) {
      return value.toISOString();
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: this.truncateAndStringify(value.message, 0, maxStringLength),
        stack: this.truncateAndStringify(value.stack, 0, maxStringLength),
      };
    }

    if (this.isBufferOrArrayBufferView(value)) {
      return `[Binary data of length ${value.byteLength}]`;
    }

    if (Array.isArray(value)) {
      return value.map((item) =>
        this.truncateAndStringify(item, depth + 1, maxStringLength, maxDepth)
      );
    }

    if (typeof value === "object") {
      const truncatedObject: Record<string, unknown> = {};
      for (const [key, prop] of Object.entries(value)) {
        truncatedObject[key] = this.truncateAndStringify(
          prop,
          depth + 1,
          maxStringLength,
          maxDepth
        );
      }
      return truncatedObject;
    }

    return "[Unserializable data]";
  }

  private static isBufferOrArrayBufferView(
    value: unknown
  ): value is ArrayBufferView | ArrayBuffer {
    if (Buffer.isBuffer(value) || ArrayBuffer.isView(value)) {
      return true;
    }

    return value instanceof ArrayBuffer;
  }
}
