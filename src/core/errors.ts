import { LoggableError } from "../logging/Loggable";

/**
 * A broker payload that is not a chat message this relay can read.
 */
export class DecodeError extends LoggableError {
  constructor(message: string, rawBody?: unknown, originalError?: Error) {
    super(message, { rawBody }, originalError);
    this.name = "DecodeError";
  }
}

/**
 * Connection or publish failure towards the broker.
 */
export class BrokerConnectivityError extends LoggableError {
  constructor(message: string, payload?: unknown, originalError?: Error) {
    super(message, payload, originalError);
    this.name = "BrokerConnectivityError";
  }
}

export class ConfigurationError extends LoggableError {
  constructor(message: string, payload?: unknown) {
    super(message, payload);
    this.name = "ConfigurationError";
  }
}
