import { describe, it, expect, afterEach, vi } from 'vitest';
import { createRootLogger } from '../../../src/kernel/logger.js';

describe('createRootLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to stderr and leaves stdout to command output', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createRootLogger({ level: 'info' }).child({ component: 'negotiation' }).info({ roundId: 'round-1' }, 'Round started');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(stderr.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'info',
      name: 'curia',
      component: 'negotiation',
      roundId: 'round-1',
      msg: 'Round started',
    });
  });

  it('writes to the given destination at the given level', () => {
    const lines: string[] = [];
    const logger = createRootLogger({ level: 'warn', destination: { write: (msg: string) => lines.push(msg) } });

    logger.info('dropped');
    logger.warn('kept');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'warn', msg: 'kept' });
  });
});
