export * from './events/index.js';
export { applyLoggingConfig, createEventBus, loadConfig, resolveConfig } from './config.js';
export type { ConfigEnv } from './config.js';
export { MessageTypeMismatchError, UnkeyedMessageError } from './errors.js';
export { BusLogger, formatEntry, logger } from './logger.js';
export type { BusLoggerOptions } from './logger.js';
export { BusConfigSchema, LoggingConfigSchema, LogLevelSchema } from './types.js';
export type {
  BusConfig,
  BusConfigInput,
  ListenerId,
  LogEntry,
  LoggingConfig,
  LogLevel,
  LogMetadata,
  MessageHandler,
  MessageTypeKey,
  Unsubscribe,
} from './types.js';
