import { Readable, Writable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { createLogger } from '../../src/logger.js';
import { confirmOnTerminal, isYes } from '../../src/prompt.js';

describe('confirmation answers', () => {
  it('uses the default for an empty answer', () => {
    expect(isYes('', true)).toBe(true);
    expect(isYes('  ', false)).toBe(false);
  });

  it('accepts only y or Y as yes', () => {
    expect(isYes('y', false)).toBe(true);
    expect(isYes('Y', false)).toBe(true);
    expect(isYes('yes', true)).toBe(false);
    expect(isYes('n', true)).toBe(false);
  });
});

describe('terminal confirmation', () => {
  it('asks only after pretty log lines are on the shared output', async () => {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString('utf8'));
        callback();
      }
    });
    const logger = createLogger({ LOG_LEVEL: 'info', LOG_PRETTY: true }, output);

    logger.info('Project: demo-project');
    logger.info('Service: postgres-a');
    const answer = await confirmOnTerminal('This is for a PRIMARY. Continue?', true, {
      input: Readable.from(['n\n']),
      output
    });

    expect(answer).toBe(false);
    const text = chunks.join('');
    const banner = text.indexOf('Service: postgres-a');
    const question = text.indexOf('This is for a PRIMARY. Continue? [Y/n]: ');
    expect(banner).toBeGreaterThanOrEqual(0);
    expect(question).toBeGreaterThan(banner);
  });
});
