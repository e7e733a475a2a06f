export { runCli, USAGE } from './cli.js';
export type { CliIO } from './cli.js';
export { resolveConfig, DEFAULT_CONFIG } from './config.js';
export type { ArmoryConfig, ConfigFlags } from './config.js';
export {
  parseArmorDatabase,
  readArmorDatabase,
  loadArmorDatabase,
  FIELD_SEPARATOR,
} from './loader.js';
export type { ParsedDatabase, SkippedRecord } from './loader.js';
export { formatArmorList, formatSolveResult, formatComparison } from './report.js';
