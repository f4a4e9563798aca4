/**
 * Optional YAML configuration file
 * Loaded from LEDGER_CONFIG_PATH or ~/.config/ledger/config.yaml
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import type { FileConfig } from '../types/config.js';

const fileConfigSchema = z
  .object({
    database_path: z.string().min(1).optional(),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'ledger', 'config.yaml');
}

/**
 * Read and validate the YAML file. A missing file yields an empty config;
 * a malformed one throws.
 */
export function loadFileConfig(configPath: string): FileConfig {
  if (!existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}`);
    return {};
  }

  const raw: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
  // An empty file parses to null
  const result = fileConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config file ${configPath}:\n${errors}`);
  }

  logger.debug(`Loaded config file: ${configPath}`);
  return result.data;
}
