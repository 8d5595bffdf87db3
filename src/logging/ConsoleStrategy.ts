import util from "util";
import chalk from "chalk";
import { LogLevelName, LogMessage, LogPayload, LogStrategy } from "./LogStrategy";

type Writer = (line: string) => void;

export class ConsoleStrategy extends LogStrategy {
  private static readonly LOG_COLORS: Record<LogLevelName, chalk.Chalk> = {
    INFO: chalk.blue,
    WARN: chalk.yellow,
    ERROR: chalk.red,
    DEBUG: chalk.green,
  };

  constructor(
    maxStringLength = 5000,
    maxDepth = 10,
    private readonly write: Writer = (line) => console.log(line)
  ) {
    super();
    this.MAX_STRING_LENGTH = maxStringLength;
    this.MAX_DEPTH = maxDepth;
  }

  protected async sendPackaged(message: LogMessage): Promise<void> {
    this.write(this.formatLogMessage(message));
  }

  private formatLogMessage(logMessage: LogMessage): string {
    const { sender, timestamp, level, message, payload } = logMessage;
    const color = ConsoleStrategy.LOG_COLORS[level];

    let formattedMessage = color(`[${level}] ${timestamp}`);

    if (sender) {
      formattedMessage += color(` [${sender}]`);
    }

    formattedMessage += color(` - ${message}`);

    if (payload) {
      formattedMessage += "\n" + this.formatPayload(payload);
    }

    return formattedMessage;
  }

  private formatPayload(payload: LogPayload): string {
    if (payload.type === "text") {
      return `  ${payload.content}`;
    }
    return util
      .inspect(payload.content, { depth: this.MAX_DEPTH, colors: true })
      .split("\n")
      .map((line) => `  ${line}`)
      .join("\n");
  }
}
