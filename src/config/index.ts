/**
 * Configuration module.
 * Report defaults plus the optional YAML/JSON config file.
 * Zod-validated; CLI flags override file values, file values override defaults.
 */

export {
  REPORT_DEFAULTS,
  NOT_AVAILABLE,
  EXIT_CODES,
  IMPLEMENTATIONS,
  COMPARISON_WINNER,
  COMPARISON_ROWS,
  OPERATIONS,
  RANK_MEDALS,
} from './defaults.js';
export type { Implementation, ComparisonRow } from './defaults.js';
export { loadConfigFile, ConfigError } from './loader.js';
