import { IQueueStrategy } from "../interfaces";
import { InMemoryQueueStrategy } from "../core/InMemoryQueueStrategy";
import { ConsoleStrategy } from "./ConsoleStrategy";
import {
  LogLevel,
  LogLevelName,
  LogMessage,
  LogPayload,
  LogStrategy,
} from "./LogStrategy";

/**
 * @fileoverview Queued logging shared by every relay component. Messages are
 * buffered and flushed by the active {@link LogStrategy} on a short timer.
 */

const FLUSH_DELAY_MS = 100;

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

export class LoggableError extends Error {
  public readonly payload: unknown;
  public readonly originalError: Error | undefined;

  constructor(message: string, payload?: unknown, originalError?: Error) {
    super(message);
    this.name = "LoggableError";
    this.payload = payload;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    if (originalError && originalError.stack) {
      this.stack = this.stack + "\n\nCaused by:\n" + originalError.stack;
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toJSON() {
    return {
      name: this.name,
      message: this.message,
      payload: this.payload,
      cause: this.originalError?.message,
      stack: this.stack,
    };
  }

  public toString(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }
}

/**
 * Abstract base class for objects that can log messages.
 */
export abstract class Loggable {
  private static logStrategy: LogStrategy = new ConsoleStrategy();
  private static queueStrategy: IQueueStrategy<LogMessage> =
    new InMemoryQueueStrategy<LogMessage>();
  private static logLevel: LogLevel = LogLevel.INFO;
  private static isProcessing: boolean = false;
  private static processingTimeout: NodeJS.Timeout | null = null;
  static LogLevel = LogLevel;

  /**
   * Method decorator: logs a rejected or thrown error with the class name and
   * the (truncated) call arguments, then rethrows it as a LoggableError.
   */
  protected static handleErrors(
    target: object,
    propertyKey: string,
    descriptor: PropertyDescriptor
  ) {
    const originalMethod: (...args: unknown[]) => unknown = descriptor.value;
    descriptor.value = function (this: unknown, ...args: unknown[]) {
      const self: unknown = this;
      const rethrow = (error: unknown): never => {
        if (self instanceof Loggable) {
          return self.logAndThrowError(error, propertyKey, args);
        }
        throw error;
      };

      try {
        const result = originalMethod.apply(this, args);
        if (result instanceof Promise) {
          return result.catch(rethrow);
        }
        return result;
      } catch (error) {
        return rethrow(error);
      }
    };
    return descriptor;
  }

  /**
   * Sets the log strategy.
   * @param strategy - The new log strategy to use.
   */
  public static setLogStrategy(strategy: LogStrategy): void {
    Loggable.logStrategy = strategy;
  }

  /**
   * Sets the log level.
   * @param level - The new log level to use.
   */
  public static setLogLevel(level: LogLevel): void {
    Loggable.logLevel = level;
  }

  private logAndThrowError(
    error: unknown,
    propertyKey: string,
    args: unknown[]
  ): never {
    const loggableError =
      error instanceof LoggableError
        ? error
        : new LoggableError(
            error instanceof Error ? error.message : String(error),
            { originalArgs: LogStrategy.truncateAndStringify(args, 0, 300) },
            error instanceof Error ? error : undefined
          );

    this.error(`${propertyKey} failed: ${loggableError.message}`, {
      ...loggableError.toJSON(),
      throwingClass: this.constructor.name,
    });
    throw loggableError;
  }

  /**
   * Checks if a message with the given level should be logged.
   */
  public static shouldLog(messageLevel: LogLevel): boolean {
    return messageLevel >= Loggable.logLevel;
  }

  private static createLogMessage(
    level: LogLevelName,
    message: string,
    payload?: unknown,
    className?: string
  ): LogMessage {
    const prefixedMessage = className ? `${className}::${message}` : message;
    const logPayload: LogPayload | undefined =
      payload !== undefined
        ? {
            type: typeof payload === "string" ? "text" : "json",
            content: payload,
          }
        : undefined;

    return {
      timestamp: new Date().toISOString(),
      level,
      message: prefixedMessage,
      payload: logPayload,
      sender: className || "Loggable",
    };
  }

  private static logWithLevel(
    level: LogLevel,
    message: string,
    payload?: unknown,
    className?: string
  ): void {
    if (Loggable.shouldLog(level)) {
      Loggable.queueStrategy.enqueue(
        Loggable.createLogMessage(LEVEL_NAMES[level], message, payload, className)
      );
      Loggable.scheduleProcessing();
    }
  }

  public static logError(
    message: string,
    payload?: unknown,
    className?: string
  ): void {
    Loggable.logWithLevel(LogLevel.ERROR, message, payload, className);
  }

  protected debug(message: string, payload?: unknown): void {
    Loggable.logWithLevel(LogLevel.DEBUG, message, payload, this.constructor.name);
  }

  protected info(message: string, payload?: unknown): void {
    Loggable.logWithLevel(LogLevel.INFO, message, payload, this.constructor.name);
  }

  protected warn(message: string, payload?: unknown): void {
    Loggable.logWithLevel(LogLevel.WARN, message, payload, this.constructor.name);
  }

  /**
   * Logs an error message for the current instance.
   * @param messageOrError - The error message or a LoggableError; a
   * LoggableError is logged with its own JSON form as payload.
   */
  protected error(
    messageOrError: string | LoggableError,
    payload?: unknown
  ): void {
    if (messageOrError instanceof LoggableError) {
      Loggable.logWithLevel(
        LogLevel.ERROR,
        messageOrError.message,
        messageOrError.toJSON(),
        this.constructor.name
      );
      return;
    }
    Loggable.logWithLevel(
      LogLevel.ERROR,
      messageOrError,
      payload,
      this.constructor.name
    );
  }

  private static async processQueue(): Promise<void> {
    if (Loggable.isProcessing) return;

    Loggable.isProcessing = true;
    try {
      let message = Loggable.queueStrategy.dequeue();
      while (message) {
        try {
          await Loggable.logStrategy.send(message);
        } catch (error) {
          console.error("Failed to send log message:", error);
        }
        message = Loggable.queueStrategy.dequeue();
      }
    } finally {
      Loggable.isProcessing = false;
    }
  }

  // The timer is unref'd: pending log lines never keep the process alive.
  private static scheduleProcessing(): void {
    if (Loggable.processingTimeout) return;
    Loggable.processingTimeout = setTimeout(() => {
      Loggable.processingTimeout = null;
      Loggable.processQueue().finally(() => {
        if (Loggable.queueStrategy.size() > 0) {
          Loggable.scheduleProcessing();
        }
      });
    }, FLUSH_DELAY_MS);
    Loggable.processingTimeout.unref();
  }

  /**
   * Writes out every queued message now.
   */
  public static async flush(): Promise<void> {
    while (Loggable.isProcessing) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    await Loggable.processQueue();
  }

  /**
   * Flushes pending messages and stops the flush timer.
   */
  public static async shutdown(): Promise<void> {
    if (Loggable.processingTimeout) {
      clearTimeout(Loggable.processingTimeout);
      Loggable.processingTimeout = null;
    }
    await Loggable.flush();
  }
}
