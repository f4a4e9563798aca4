/**
 * Configuration loading and validation
 *
 * Environment variables take precedence over the YAML file.
 */

import { z } from 'zod';
import { resolve, join } from 'path';
import { homedir } from 'os';
import type { LedgerConfig } from '../types/config.js';
import { getDefaultConfigPath, loadFileConfig } from './file-config.js';

const envSchema = z.object({
  LEDGER_DB_PATH: z.string().min(1).optional(),
  LEDGER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  LEDGER_CONFIG_PATH: z.string().min(1).optional(),
});

export function getDefaultDatabasePath(): string {
  return join(homedir(), '.ledger', 'ledger.sqlite');
}

function resolveDatabasePath(path: string): string {
  // better-sqlite3's in-memory database name must be passed through untouched
  return path === ':memory:' ? path : resolve(path);
}

/**
 * Load configuration from environment and config file
 */
export function loadConfig(): LedgerConfig {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration error:\n${errors}`);
  }

  const env = result.data;
  const configPath = env.LEDGER_CONFIG_PATH
    ? resolve(env.LEDGER_CONFIG_PATH)
    : getDefaultConfigPath();
  const file = loadFileConfig(configPath);

  return {
    databasePath: resolveDatabasePath(
      env.LEDGER_DB_PATH ?? file.database_path ?? getDefaultDatabasePath()
    ),
    logLevel: env.LEDGER_LOG_LEVEL ?? file.log_level ?? 'info',
    configPath,
  };
}

// Singleton config instance
let configInstance: LedgerConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): LedgerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export { loadFileConfig, getDefaultConfigPath } from './file-config.js';
