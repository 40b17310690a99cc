export {
  DEFAULT_CATALOG_FILE,
  DEFAULT_PROFILES_DIR,
  formatUsage,
  HELP_SENTINEL,
  normalizeError,
  parseArgs,
  resolvePaths,
  type CliCommand,
  type CliOptions,
  type NormalizedError,
  type ResolvedPaths,
} from './cli-utils.js';
export {
  buildValidationReport,
  formatRankedLine,
  runRankCommand,
  runValidateCommand,
  type CommandContext,
  type RankCommandOptions,
  type ValidateCommandOptions,
} from './commands.js';
export {
  createLogger,
  type AdvisorLogEvent,
  type Logger,
  type LoggerOptions,
  type OutputStream,
  type RankedEntrySummary,
} from './logging.js';
export { run, type RunEnvironment } from './run.js';
