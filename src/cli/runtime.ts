import { resolve } from 'path';
import type pino from 'pino';
import type { DataStorage } from '../container/capabilities.js';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { ContainerConfig } from '../core/types.js';
import { createStorage } from '../storage/factory.js';

export interface CommonOptions {
  dir: string;
  verbose?: boolean;
  storage?: string;
}

export interface CliRuntime {
  projectDir: string;
  config: ContainerConfig;
  logger: pino.Logger;
  storage: DataStorage;
}

/**
 * Load configuration, install the process logger and build storage for a
 * CLI command.
 */
export function createRuntime(options: CommonOptions): CliRuntime {
  const projectDir = resolve(options.dir);
  const overrides: Record<string, unknown> = {};
  if (options.storage) overrides.storage = { path: options.storage, driver: 'sqlite' };
  if (options.verbose) overrides.logging = { verbose: true };

  const config = new ConfigManager(projectDir).load(overrides);
  const logger = createLogger('adaptive-container', {
    level: config.logging.level,
    verbose: config.logging.verbose,
  });
  setLogger(logger);

  return { projectDir, config, logger, storage: createStorage(config, projectDir) };
}

export function formatConfidence(confidence: number): string {
  return `${(confidence * 100).toFixed(0)}%`;
}
