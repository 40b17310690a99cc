import { describe, expect, it } from 'vitest';

import { captureOutput } from './__fixtures__/fixtures.js';
import { createLogger, type AdvisorLogEvent } from './logging.js';

const event: AdvisorLogEvent = {
  name: 'catalog.validated',
  path: '/data/upgrades.json',
  timestamp: '2024-06-01T12:00:00.000Z',
  upgrades: 3,
  warnings: 1,
};

describe('createLogger', () => {
  it('writes one compact JSON line per event', () => {
    const output = captureOutput();
    const logger = createLogger({ stream: output.stream });

    logger(event);
    logger(event);

    expect(output.lines()).toEqual([
      '{"name":"catalog.validated","path":"/data/upgrades.json","timestamp":"2024-06-01T12:00:00.000Z","upgrades":3,"warnings":1}',
      '{"name":"catalog.validated","path":"/data/upgrades.json","timestamp":"2024-06-01T12:00:00.000Z","upgrades":3,"warnings":1}',
    ]);
  });

  it('indents events when pretty', () => {
    const output = captureOutput();

    createLogger({ pretty: true, stream: output.stream })(event);

    expect(output.text()).toBe(`${JSON.stringify(event, undefined, 2)}\n`);
    expect(output.lines()[1]).toBe('  "name": "catalog.validated",');
  });
});
