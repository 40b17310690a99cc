import path from 'node:path';

import { isRankingStrategyKind, type RankingStrategyKind } from '@upgrade-advisor/core';

export type CliCommand = 'validate' | 'rank';

export const HELP_SENTINEL = '__HELP__';

export interface CliOptions {
  command: CliCommand | typeof HELP_SENTINEL;
  pretty: boolean;
  explain: boolean;
  catalog: string | undefined;
  research: string | undefined;
  profilesDir: string | undefined;
  profile: string | undefined;
  strategy: RankingStrategyKind;
  limit: number | undefined;
}

export interface NormalizedError {
  name?: string;
  message: string;
  stack?: string;
}

export interface ResolvedPaths {
  readonly catalog: string;
  readonly research: string | undefined;
  readonly profilesDir: string;
}

export const DEFAULT_CATALOG_FILE = path.join('data', 'upgrades.json');
export const DEFAULT_PROFILES_DIR = path.join('data', 'profiles');

const BOOLEAN_FLAGS = new Map<string, 'pretty' | 'explain'>([
  ['--pretty', 'pretty'],
  ['--explain', 'explain'],
]);

function parseValueArg(
  arg: string,
  argv: readonly string[],
  index: number,
  flagName: string,
): { value: string; skip: number } {
  const prefix = `${flagName}=`;
  if (arg.startsWith(prefix)) {
    const value = arg.slice(prefix.length);
    if (!value) {
      throw new Error(`Missing value for ${flagName}`);
    }
    return { value, skip: 0 };
  }
  const nextValue = argv[index + 1];
  if (!nextValue || nextValue.startsWith('--')) {
    throw new Error(`Missing value for ${flagName}`);
  }
  return { value: nextValue, skip: 1 };
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`--limit must be a positive integer, got ${value}`);
  }
  return limit;
}

function parseStrategy(value: string): RankingStrategyKind {
  if (!isRankingStrategyKind(value)) {
    throw new Error(
      `Unknown strategy: ${value} (expected per-category, balanced or reference)`,
    );
  }
  return value;
}

function isCommand(value: string | undefined): value is CliCommand {
  return value === 'validate' || value === 'rank';
}

/**
 * Parses `<command> [options]`. `--help` anywhere short-circuits with the
 * help sentinel as the command.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    command: HELP_SENTINEL,
    pretty: false,
    explain: false,
    catalog: undefined,
    research: undefined,
    profilesDir: undefined,
    profile: undefined,
    strategy: 'balanced',
    limit: undefined,
  };

  if (argv.includes('--help') || argv.includes('-h')) {
    return options;
  }

  const [command, ...rest] = argv;
  if (command === undefined) {
    return options;
  }
  if (!isCommand(command)) {
    throw new Error(`Unknown command: ${command}`);
  }
  options.command = command;

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];

    const booleanKey = BOOLEAN_FLAGS.get(arg);
    if (booleanKey !== undefined) {
      options[booleanKey] = true;
      continue;
    }

    const flagName = arg.split('=', 1)[0];
    switch (flagName) {
      case '--catalog':
      case '--research':
      case '--profiles-dir':
      case '--profile':
      case '--strategy':
      case '--limit': {
        const parsed = parseValueArg(arg, rest, index, flagName);
        index += parsed.skip;
        applyValue(options, flagName, parsed.value);
        continue;
      }
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (options.command === 'rank' && options.profile === undefined) {
    throw new Error('rank requires --profile <id>');
  }

  return options;
}

function applyValue(options: CliOptions, flagName: string, value: string): void {
  switch (flagName) {
    case '--catalog':
      options.catalog = value;
      return;
    case '--research':
      options.research = value;
      return;
    case '--profiles-dir':
      options.profilesDir = value;
      return;
    case '--profile':
      options.profile = value;
      return;
    case '--strategy':
      options.strategy = parseStrategy(value);
      return;
    case '--limit':
      options.limit = parseLimit(value);
      return;
    default:
      throw new Error(`Unknown option: ${flagName}`);
  }
}

const readEnv = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

/**
 * Flags win over `ADVISOR_*` environment variables, which win over the
 * defaults under `data/`. Relative paths resolve against `cwd`.
 */
export function resolvePaths(
  options: Pick<CliOptions, 'catalog' | 'research' | 'profilesDir'>,
  env: NodeJS.ProcessEnv,
  cwd: string,
): ResolvedPaths {
  const catalog =
    options.catalog ?? readEnv(env, 'ADVISOR_CATALOG_PATH') ?? DEFAULT_CATALOG_FILE;
  const research = options.research ?? readEnv(env, 'ADVISOR_RESEARCH_PATH');
  const profilesDir =
    options.profilesDir ?? readEnv(env, 'ADVISOR_PROFILES_DIR') ?? DEFAULT_PROFILES_DIR;
  return {
    catalog: path.resolve(cwd, catalog),
    research: research === undefined ? undefined : path.resolve(cwd, research),
    profilesDir: path.resolve(cwd, profilesDir),
  };
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function formatUsage(): string {
  return [
    'Usage: advisor <command> [options]',
    '',
    'Commands:',
    '  validate                   Check the upgrade catalog and print a summary.',
    '  rank --profile <id>        Rank the next upgrade purchases for a profile.',
    '',
    'Options:',
    '  --catalog <path>           Catalog file (env ADVISOR_CATALOG_PATH).',
    '  --research <path>          Research file (env ADVISOR_RESEARCH_PATH).',
    '  --profiles-dir <path>      Profile directory (env ADVISOR_PROFILES_DIR).',
    '  --strategy <kind>          per-category, balanced (default) or reference.',
    '  --limit <n>                Show only the first n recommendations.',
    '  --explain                  Print the arithmetic behind each recommendation.',
    '  --pretty                   Pretty-print JSON log events.',
    '  -h, --help                 Show this help text.',
  ].join('\n');
}
