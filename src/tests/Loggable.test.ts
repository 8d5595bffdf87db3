import chalk from "chalk";
import { ConsoleStrategy, Loggable, LoggableError, LogLevel } from "../logging";
import { CapturingLogStrategy, captureLogs } from "./helpers";

class Worker extends Loggable {
  run(message: string) {
    this.debug(`debug ${message}`);
    this.info(`info ${message}`);
    this.warn(`warn ${message}`);
    this.error(`error ${message}`, { attempt: 1 });
  }

  @Loggable.handleErrors
  async explode(reason: string): Promise<void> {
    throw new Error(reason);
  }
}

describe("Loggable", () => {
  let logs: CapturingLogStrategy;

  beforeEach(async () => {
    logs = await captureLogs();
    Loggable.setLogLevel(LogLevel.INFO);
  });

  afterAll(async () => {
    Loggable.setLogLevel(LogLevel.INFO);
    await Loggable.shutdown();
  });

  test("messages below the log level are dropped", async () => {
    Loggable.setLogLevel(LogLevel.WARN);
    new Worker().run("job");
    await Loggable.flush();

    expect(logs.messages.map((entry) => [entry.level, entry.message])).toEqual([
      ["WARN", "Worker::warn job"],
      ["ERROR", "Worker::error job"],
    ]);
    expect(logs.messages[1].sender).toBe("Worker");
    expect(logs.messages[1].payload).toEqual({ type: "json", content: { attempt: 1 } });
  });

  test("handleErrors logs the failure and rethrows it as a LoggableError", async () => {
    await expect(new Worker().explode("disk full")).rejects.toBeInstanceOf(LoggableError);
    await Loggable.flush();

    const [entry] = logs.at("ERROR");
    expect(entry.message).toContain("disk full");
  });

  test("a strategy receives the message itself with its payload truncated", async () => {
    const strategy = new CapturingLogStrategy();

    await strategy.send({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "INFO",
      sender: "QueueConsumer",
      message: "QueueConsumer::received",
      payload: { type: "json", content: { body: "x".repeat(5001) } },
    });

    expect(strategy.messages).toEqual([
      {
        timestamp: "2024-05-01T10:00:00.000Z",
        level: "INFO",
        sender: "QueueConsumer",
        message: "QueueConsumer::received",
        payload: { type: "json", content: { body: `${"x".repeat(5000)}...` } },
      },
    ]);
  });

  test("LoggableError keeps its payload and cause in toJSON", () => {
    const cause = new Error("socket reset");
    const error = new LoggableError("publish failed", { queue: "ping" }, cause);

    expect(error.toJSON()).toMatchObject({
      name: "LoggableError",
      message: "publish failed",
      payload: { queue: "ping" },
      cause: "socket reset",
    });
    expect(error.stack).toContain("Caused by:");
  });
});

describe("ConsoleStrategy", () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  test("prints level, time, sender and message, then the payload indented", async () => {
    const lines: string[] = [];
    const strategy = new ConsoleStrategy(5000, 10, (line) => lines.push(line));

    await strategy.send({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "WARN",
      sender: "QueuePublisher",
      message: "QueuePublisher::retrying",
      payload: { type: "text", content: "broker busy" },
    });

    expect(lines).toEqual([
      "[WARN] 2024-05-01T10:00:00.000Z [QueuePublisher] - QueuePublisher::retrying\n  broker busy",
    ]);
  });

  test("truncates long payload strings", async () => {
    const lines: string[] = [];
    const strategy = new ConsoleStrategy(5, 10, (line) => lines.push(line));

    await strategy.send({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "INFO",
      message: "raw",
      payload: { type: "text", content: "abcdefghij" },
    });

    expect(lines).toEqual(["[INFO] 2024-05-01T10:00:00.000Z - raw\n  abcde..."]);
  });
});
