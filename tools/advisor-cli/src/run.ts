import { CatalogSchemaError, CatalogValidationError } from '@upgrade-advisor/catalog-schema';
import {
  createConsoleTelemetry,
  ProfileMutationError,
  resolveAdvisorConfig,
} from '@upgrade-advisor/core';

import {
  formatUsage,
  HELP_SENTINEL,
  normalizeError,
  parseArgs,
  resolvePaths,
  type CliOptions,
} from './cli-utils.js';
import { runRankCommand, runValidateCommand, type CommandContext } from './commands.js';
import { createLogger, type Logger, type OutputStream } from './logging.js';

export interface RunEnvironment {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
}

const defaultEnvironment = (): RunEnvironment => ({
  env: process.env,
  cwd: process.cwd(),
  stdout: process.stdout,
  stderr: process.stderr,
});

function logUnhandledCliError(error: unknown, logger: Logger): void {
  const normalized = normalizeError(error);
  logger({
    name: 'cli.unhandled_error',
    message: normalized.message,
    timestamp: new Date().toISOString(),
    fatal: true,
    ...(normalized.name ? { errorName: normalized.name } : {}),
    ...(normalized.stack ? { stack: normalized.stack } : {}),
  });
}

/** Parses `argv`, runs the command and resolves to the process exit code. */
export async function run(
  argv: readonly string[],
  environment: RunEnvironment = defaultEnvironment(),
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    environment.stderr.write(`${normalizeError(error).message}\n`);
    environment.stderr.write(`${formatUsage()}\n`);
    return 1;
  }

  if (options.command === HELP_SENTINEL) {
    environment.stdout.write(`${formatUsage()}\n`);
    return 0;
  }

  const logger = createLogger({ pretty: options.pretty, stream: environment.stderr });
  const context: CommandContext = {
    logger,
    stdout: environment.stdout,
    stderr: environment.stderr,
    config: resolveAdvisorConfig(),
    telemetry: createConsoleTelemetry(),
  };
  const paths = resolvePaths(options, environment.env, environment.cwd);

  try {
    if (options.command === 'validate') {
      return await runValidateCommand({ catalogPath: paths.catalog }, context);
    }
    return await runRankCommand(
      {
        catalogPath: paths.catalog,
        researchPath: paths.research,
        profilesDir: paths.profilesDir,
        profileId: options.profile ?? '',
        strategy: options.strategy,
        explain: options.explain,
        limit: options.limit,
      },
      context,
    );
  } catch (error) {
    if (error instanceof CatalogValidationError) {
      const details = error.issues.map((issue) => `  - ${issue.message}\n`).join('');
      environment.stderr.write(`${error.message}\n${details}`);
      return 1;
    }
    if (error instanceof CatalogSchemaError || error instanceof ProfileMutationError) {
      environment.stderr.write(`${error.message}\n`);
      return 1;
    }
    logUnhandledCliError(error, logger);
    return 1;
  }
}
