export { ErrorMapper } from "./ErrorMapper";
export { createLogger, LOG_LEVELS, type Logger, type LogLevel } from "./Logger";
