export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface DepsnapConfig {
  /** Debounce window for "snapshot changed" notifications, in milliseconds */
  throttleMs?: number;
  /** Names of built-in snapshot filters to skip */
  disabledFilters?: string[];
  logLevel?: LogLevelName;
}

export interface ConfigSource {
  global: DepsnapConfig | null;
  project: DepsnapConfig | null;
  env: DepsnapConfig;
}
