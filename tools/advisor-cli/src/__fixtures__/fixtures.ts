import { fileURLToPath } from 'node:url';

import type { OutputStream } from '../logging.js';

export const CLI_CATALOG_PATH = fileURLToPath(new URL('./catalog.json', import.meta.url));
export const BROKEN_CATALOG_PATH = fileURLToPath(
  new URL('./broken-catalog.json5', import.meta.url),
);

export interface CapturedOutput {
  readonly stream: OutputStream;
  text(): string;
  lines(): string[];
}

export const captureOutput = (): CapturedOutput => {
  let buffer = '';
  return {
    stream: {
      write: (chunk: string | Uint8Array) => {
        buffer += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');
        return true;
      },
    },
    text: () => buffer,
    lines: () => buffer.split('\n').filter((line) => line.length > 0),
  };
};
