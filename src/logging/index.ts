export { Loggable, LoggableError } from "./Loggable";
export {
  LogStrategy,
  LogLevel,
  LogLevelName,
  LogMessage,
  LogPayload,
} from "./LogStrategy";
export { ConsoleStrategy } from "./ConsoleStrategy";
