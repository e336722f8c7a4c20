/**
 * Centralized configuration constants for depsnap
 *
 * Timings and well-known project property names used across the
 * subscription and snapshot pipeline live here so they can be tuned in one place.
 */

/**
 * Snapshot notification configuration
 */
export const SNAPSHOT_CONSTANTS = {
  /** Window in milliseconds used to coalesce "snapshot changed" notifications */
  THROTTLE_MS: 250,

  /** Smallest throttle window accepted from configuration */
  MIN_THROTTLE_MS: 10,
} as const;

/**
 * Project property and rule names the host listens to
 */
export const PROJECT_PROPERTY_NAMES = {
  /** Rule carrying the general configuration properties of a project */
  CONFIGURATION_GENERAL_RULE: 'ConfigurationGeneral',

  /** Single-target property */
  TARGET_FRAMEWORK: 'TargetFramework',

  /** Multi-target property (semicolon separated) */
  TARGET_FRAMEWORKS: 'TargetFrameworks',

  /** Configuration dimension that distinguishes inner (per-target) projects */
  TARGET_FRAMEWORK_DIMENSION: 'TargetFramework',
} as const;

/**
 * Manifest watcher configuration
 */
export const WATCHER_CONSTANTS = {
  /** Stability threshold for manifest write detection */
  STABILITY_THRESHOLD_MS: 100,

  /** Poll interval for manifest stability check */
  POLL_INTERVAL_MS: 50,
} as const;

/**
 * Default manifest file name looked up by the CLI
 */
export const DEFAULT_MANIFEST_FILE = 'depsnap.json';
