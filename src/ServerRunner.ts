import { Loggable } from "./logging";

export interface RunnableService {
  getServiceId(): string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ServerRunnerOptions {
  /** Exit the process after a signal-triggered shutdown. Defaults to true. */
  exitOnShutdown?: boolean;
  /** Runs after every service stopped, before exiting. */
  onShutdown?: () => Promise<void>;
}

/**
 * Starts registered services in order, stops them in reverse order, and
 * installs the process signal handlers.
 */
export class ServerRunner extends Loggable {
  private services: RunnableService[] = [];
  private isStarted: boolean = false;
  private readonly exitOnShutdown: boolean;
  private readonly onShutdown?: () => Promise<void>;
  private readonly signalHandler = (signal: NodeJS.Signals) => {
    this.handleShutdown(signal).catch((error) => {
      this.error("Shutdown failed", error);
    });
  };
  private readonly rejectionHandler = (reason: unknown) => {
    this.error("Unhandled Rejection", reason);
  };

  constructor(options: ServerRunnerOptions = {}) {
    super();
    this.exitOnShutdown = options.exitOnShutdown ?? true;
    this.onShutdown = options.onShutdown;
  }

  public registerService(service: RunnableService) {
    this.services.push(service);
    this.info(`Registered service: ${service.getServiceId()}`);
  }

  private installHandlers() {
    process.on("SIGINT", this.signalHandler);
    process.on("SIGTERM", this.signalHandler);
    process.on("unhandledRejection", this.rejectionHandler);
  }

  private removeHandlers() {
    process.off("SIGINT", this.signalHandler);
    process.off("SIGTERM", this.signalHandler);
    process.off("unhandledRejection", this.rejectionHandler);
  }

  private async handleShutdown(signal: NodeJS.Signals) {
    this.info(`Received [${signal}]. Shutting down all services...`);
    await this.stop();
    await Loggable.shutdown();
    if (this.exitOnShutdown) {
      process.exit(0);
    }
  }

  public async stop() {
    if (!this.isStarted) return;
    this.isStarted = false;
    this.info(`Stopping all services...`);
    for (const service of [...this.services].reverse()) {
      try {
        await service.stop();
        this.info(`Stopped service: ${service.getServiceId()}`);
      } catch (error) {
        this.error(`Error stopping service ${service.getServiceId()}:`, error);
      }
    }
    if (this.onShutdown) {
      await this.onShutdown();
    }
    this.removeHandlers();
    this.info(`All services stopped.`);
  }

  /**
   * Starts every service. If one fails, the ones already started are stopped
   * and the error is rethrown.
   */
  public async start() {
    if (this.isStarted) return;
    this.info(`Starting all services...`);
    this.installHandlers();
    this.isStarted = true;
    try {
      for (const service of this.services) {
        await service.start();
        this.info(`Started service: ${service.getServiceId()}`);
      }
      this.info(`All services are running...`);
    } catch (error) {
      this.error(`Error starting services:`, error);
      await this.stop();
      throw error;
    }
  }

  public isRunning(): boolean {
    return this.isStarted;
  }
}
