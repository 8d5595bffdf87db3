import { hostname } from "os";
import { Loggable, LogLevel } from "./logging";
import { AppConfig, loadConfig } from "./config/RelayConfig";
import { ConfigurationError } from "./core/errors";
import { IQueueClient } from "./interfaces";
import { AmqpQueueClient } from "./brokers/AmqpQueueClient";
import { InMemoryQueueClient } from "./brokers/InMemoryQueueClient";
import { ChatRelay } from "./ChatRelay";
import { ServerRunner } from "./ServerRunner";

export function createQueueClient(config: AppConfig): IQueueClient {
  if (config.broker.transport === "memory") {
    return new InMemoryQueueClient();
  }
  const relayIds = config.relays.map((relay) => relay.serviceId).join("+");
  return new AmqpQueueClient(config.broker, `chat-relay-${relayIds}-${hostname()}-${process.pid}`);
}

async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      Loggable.logError(`Invalid configuration: ${error.message}`, error.toJSON(), "main");
      await Loggable.shutdown();
      process.exit(1);
    }
    throw error;
  }

  Loggable.setLogLevel(LogLevel[config.logLevel]);

  // Relays in one process share a single broker connection.
  const client = createQueueClient(config);
  const relays = config.relays.map((relay) => new ChatRelay(relay, client));

  const runner = new ServerRunner({ onShutdown: () => client.close() });
  relays.forEach((relay) => runner.registerService(relay));

  try {
    await client.connect();
    await runner.start();
  } catch (error) {
    Loggable.logError("Chat relay failed to start", error, "main");
    await client.close();
    await Loggable.shutdown();
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
