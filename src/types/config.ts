/**
 * Configuration and tool response types
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LedgerConfig {
  databasePath: string;
  logLevel: LogLevel;
  configPath: string;
}

// Optional YAML file (~/.config/ledger/config.yaml)
export interface FileConfig {
  database_path?: string | undefined;
  log_level?: LogLevel | undefined;
}

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;
