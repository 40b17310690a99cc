export interface RankedEntrySummary {
  readonly upgradeId: string;
  readonly score: number;
  readonly cost: number;
  readonly affordable: boolean;
}

export type AdvisorLogEvent =
  | {
      readonly name: 'catalog.validated';
      readonly path: string;
      readonly timestamp: string;
      readonly upgrades: number;
      readonly warnings: number;
    }
  | {
      readonly name: 'catalog.validation_failed';
      readonly path: string;
      readonly timestamp: string;
      readonly errors: number;
      readonly warnings: number;
      readonly codes: readonly string[];
    }
  | {
      readonly name: 'ranking.completed';
      readonly profileId: string;
      readonly strategy: string;
      readonly timestamp: string;
      readonly durationMs: number;
      readonly candidates: number;
      readonly top: readonly RankedEntrySummary[];
    }
  | {
      readonly name: 'cli.unhandled_error';
      readonly message: string;
      readonly timestamp: string;
      readonly fatal: true;
      readonly errorName?: string;
      readonly stack?: string;
    };

export type Logger = (event: AdvisorLogEvent) => void;

export type OutputStream = Pick<NodeJS.WritableStream, 'write'>;

export interface LoggerOptions {
  readonly pretty?: boolean;
  readonly stream?: OutputStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { pretty = false, stream = process.stdout } = options;

  return (event) => {
    const serialized = JSON.stringify(event, undefined, pretty ? 2 : undefined);
    stream.write(`${serialized}\n`);
  };
}
