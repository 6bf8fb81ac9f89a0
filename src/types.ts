import { z } from 'zod';

// --- Configuration Types ---

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('warn'),
  console: z.boolean().default(true),
  // Optional JSON file the logger rewrites after every entry.
  file: z.string().min(1).optional(),
  // Older entries are dropped from memory (and from the file) past this count.
  max_entries: z.number().int().positive().default(1000),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const BusConfigSchema = z.object({
  name: z.string().min(1).default('bus'),
  // Log every immediate dispatch with its fan-out count (debug level).
  trace_dispatch: z.boolean().default(false),
  logging: LoggingConfigSchema.default({}),
});
export type BusConfig = z.infer<typeof BusConfigSchema>;
export type BusConfigInput = z.input<typeof BusConfigSchema>;

// --- Logging Types ---

export interface LogMetadata {
  listenerId?: number;
  kind?: string;
  count?: number;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  content: string;
  metadata?: LogMetadata;
}

// --- Bus Types ---

/** Identifier the registration table is keyed by; one per message kind. */
export type MessageTypeKey = symbol;

/** Assigned by the bus, starting at 1. `0` marks a listener with no bus. */
export type ListenerId = number;

export type MessageHandler<T> = (message: T) => void;

export type Unsubscribe = () => void;
