import { z } from "zod";
import { ConfigurationError } from "../core/errors";
import { LogLevelName } from "../logging/LogStrategy";

export type RelayProfile = "ping" | "pong";
export type BrokerTransport = "amqp" | "memory";

export interface BrokerConfig {
  readonly transport: BrokerTransport;
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly password: string;
  /** Reconnect attempts before the client gives up. */
  readonly reconnectAttempts: number;
  /** First reconnect delay in ms. */
  readonly retryInterval: number;
  /** Growth factor of the reconnect delay; 1 keeps it fixed. */
  readonly retryMultiplier: number;
}

export interface RelayConfig {
  /** Identity stamped on every message this relay sends. */
  readonly serviceId: string;
  /** Display name injected into the chat page. */
  readonly serviceName: string;
  readonly inboundQueue: string;
  readonly outboundQueue: string;
  readonly port: number;
  readonly wsPath: string;
}

export interface AppConfig {
  readonly relays: ReadonlyArray<RelayConfig>;
  readonly broker: BrokerConfig;
  readonly logLevel: LogLevelName;
}

type Env = Record<string, string | undefined>;

// Each relay consumes the queue named after itself and publishes to its peer's.
const PROFILE_DEFAULTS: Record<RelayProfile, Omit<RelayConfig, "wsPath">> = {
  ping: {
    serviceId: "ping",
    serviceName: "ping",
    inboundQueue: "ping",
    outboundQueue: "pong",
    port: 8081,
  },
  pong: {
    serviceId: "pong",
    serviceName: "pong",
    inboundQueue: "pong",
    outboundQueue: "ping",
    port: 8082,
  },
};

// Unset and blank variables take their defaults.
function blankToUndefined(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema);
}

function withMessage(message: string) {
  return { errorMap: () => ({ message }) };
}

function numberAtLeast(min: number) {
  const message = `must be a number >= ${min}`;
  return z.coerce.number({ invalid_type_error: message }).finite(message).min(min, message);
}

function tcpPort() {
  return numberAtLeast(0).int("must be a TCP port").max(65535, "must be a TCP port");
}

const envSchema = z.object({
  RELAY_PROFILE: fromEnv(
    z.enum(["ping", "pong", "both"], withMessage('must be "ping", "pong" or "both"')).default("ping")
  ),
  SERVICE_NAME: fromEnv(z.string().optional()),
  INBOUND_QUEUE: fromEnv(z.string().optional()),
  OUTBOUND_QUEUE: fromEnv(z.string().optional()),
  PORT: fromEnv(tcpPort().optional()),
  WS_PATH: fromEnv(z.string().startsWith("/", 'must start with "/"').default("/ws")),
  MQ_TRANSPORT: fromEnv(z.enum(["amqp", "memory"], withMessage('must be "amqp" or "memory"')).default("amqp")),
  MQ_HOST: fromEnv(z.string().default("localhost")),
  MQ_PORT: fromEnv(tcpPort().default(5672)),
  MQ_USER: fromEnv(z.string().default("artemis")),
  MQ_PASS: fromEnv(z.string().default("artemis")),
  MQ_RECONNECT_ATTEMPTS: fromEnv(numberAtLeast(0).default(3)),
  MQ_RETRY_INTERVAL: fromEnv(numberAtLeast(1).default(5000)),
  MQ_RETRY_MULTIPLIER: fromEnv(numberAtLeast(1).default(2)),
  LOG_LEVEL: z.preprocess(
    (value) => {
      const trimmed = blankToUndefined(value);
      return typeof trimmed === "string" ? trimmed.toUpperCase() : trimmed;
    },
    z.enum(["DEBUG", "INFO", "WARN", "ERROR"], withMessage("must be DEBUG, INFO, WARN or ERROR")).default("INFO")
  ),
});

function describeIssues(error: z.ZodError, env: Env): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.join(".");
      return `${key} ${issue.message}, got "${env[key] ?? ""}"`;
    })
    .join("; ");
}

/**
 * Reads the environment once. The returned object is frozen and passed by
 * reference to every component that needs it.
 *
 * `RELAY_PROFILE=both` runs the ping and pong relays side by side; in that
 * mode the per-relay overrides (`SERVICE_NAME`, queues, `PORT`) are ignored.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error, env), result.error.issues);
  }
  const vars = result.data;

  const profile = vars.RELAY_PROFILE;
  const profiles: RelayProfile[] = profile === "both" ? ["ping", "pong"] : [profile];

  const relays = profiles.map((name): RelayConfig => {
    const defaults = PROFILE_DEFAULTS[name];
    const relay: RelayConfig =
      profiles.length > 1
        ? { ...defaults, wsPath: vars.WS_PATH }
        : {
            serviceId: defaults.serviceId,
            serviceName: vars.SERVICE_NAME ?? defaults.serviceName,
            inboundQueue: vars.INBOUND_QUEUE ?? defaults.inboundQueue,
            outboundQueue: vars.OUTBOUND_QUEUE ?? defaults.outboundQueue,
            port: vars.PORT ?? defaults.port,
            wsPath: vars.WS_PATH,
          };
    if (relay.inboundQueue === relay.outboundQueue) {
      throw new ConfigurationError(
        `Relay ${relay.serviceId} would consume its own queue "${relay.inboundQueue}"`
      );
    }
    return Object.freeze(relay);
  });

  const broker: BrokerConfig = Object.freeze({
    transport: vars.MQ_TRANSPORT,
    host: vars.MQ_HOST,
    port: vars.MQ_PORT,
    username: vars.MQ_USER,
    password: vars.MQ_PASS,
    reconnectAttempts: vars.MQ_RECONNECT_ATTEMPTS,
    retryInterval: vars.MQ_RETRY_INTERVAL,
    retryMultiplier: vars.MQ_RETRY_MULTIPLIER,
  });

  const logLevel: LogLevelName = vars.LOG_LEVEL;
  return Object.freeze({ relays: Object.freeze(relays), broker, logLevel });
}
