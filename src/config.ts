import * as fs from 'fs';
import * as yaml from 'yaml';
import { BusConfigSchema, LogLevelSchema } from './types.js';
import type { BusConfig } from './types.js';
import { EventBus } from './events/eventBus.js';
import { logger } from './logger.js';
import type { BusLogger } from './logger.js';
import { isTruthyFlag } from './utils.js';

export type ConfigEnv = Record<string, string | undefined>;

/**
 * Validate an in-memory config and apply environment overrides:
 * `EVENT_BUS_LOG_LEVEL` (debug|info|warn|error) and `EVENT_BUS_TRACE` (1|true|yes|on).
 */
export function resolveConfig(input: unknown = {}, env: ConfigEnv = process.env): BusConfig {
  const config = BusConfigSchema.parse(input ?? {});

  const level = env.EVENT_BUS_LOG_LEVEL?.toLowerCase().trim();
  if (level) {
    config.logging.level = LogLevelSchema.parse(level);
  }
  if (env.EVENT_BUS_TRACE !== undefined) {
    config.trace_dispatch = isTruthyFlag(env.EVENT_BUS_TRACE);
  }
  return config;
}

export function loadConfig(configPath: string, env: ConfigEnv = process.env): BusConfig {
  logger.info('config', `Loading configuration from ${configPath}`);

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const parsedYaml: unknown = yaml.parse(fileContents);

    const config = resolveConfig(parsedYaml, env);

    logger.info('config', 'Configuration loaded and validated successfully.');
    return config;
  } catch (error) {
    logger.error('config', `Failed to load config: ${error instanceof Error ? error.message : String(error)}`, {
      path: configPath,
    });
    throw error;
  }
}

export function applyLoggingConfig(target: BusLogger, config: BusConfig): void {
  target.configure(config.logging);
}

/**
 * Build a bus from a resolved config. The logging section is applied to the
 * given logger (the shared one by default).
 */
export function createEventBus(config: BusConfig = resolveConfig(), target: BusLogger = logger): EventBus {
  applyLoggingConfig(target, config);
  return new EventBus({ name: config.name, traceDispatch: config.trace_dispatch, logger: target });
}
