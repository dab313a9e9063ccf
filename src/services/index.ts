// Service Singletons and Factories
// ES Modules handle singletons naturally - no DI container needed

import { defaultConfig, type AppConfig } from '@/config';
import { ConsoleCheckpointPrompt } from './ConsoleCheckpointPrompt';
import { ConversionRunner } from './ConversionRunner';
import type { DashboardWriter } from './DashboardRenderer';
import type { ICheckpointHandler, ITTSSessionFactory } from './interfaces';
import { createLogger, createLoggerStore, type Logger, type LoggerStore } from './Logger';

// ============================================================================
// Core Singletons (initialized once)
// ============================================================================

let loggerStoreInstance: LoggerStore | null = null;
let loggerInstance: Logger | null = null;

/**
 * Get or create the log store shown in the dashboard footer
 */
export function getLoggerStore(): LoggerStore {
  if (!loggerStoreInstance) {
    loggerStoreInstance = createLoggerStore();
  }
  return loggerStoreInstance;
}

/**
 * Get or create the logger singleton
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger(getLoggerStore());
  }
  return loggerInstance;
}

/**
 * Reset the logger singletons (for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
  loggerStoreInstance = null;
}

// ============================================================================
// Factories (new instance per run)
// ============================================================================

export interface ConversionRunnerOptions {
  sessionFactory: ITTSSessionFactory;
  config?: AppConfig;
  /** Defaults to a terminal prompt on stdin/stdout */
  checkpointHandler?: ICheckpointHandler;
  /** Defaults to a dashboard on stdout; null turns it off */
  writer?: DashboardWriter | null;
}

/**
 * Wire a runner with the shared logger and the console defaults
 */
export function createConversionRunner(options: ConversionRunnerOptions): ConversionRunner {
  const logger = getLogger();
  return new ConversionRunner({
    config: options.config ?? defaultConfig,
    sessionFactory: options.sessionFactory,
    checkpointHandler: options.checkpointHandler ?? new ConsoleCheckpointPrompt({ logger: logger.child('checkpoint') }),
    logger,
    loggerStore: getLoggerStore(),
    writer: options.writer,
  });
}
