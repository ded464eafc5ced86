/**
 * Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { log, logCandidates, logError, logPercept, setVerbose } from './logger.js';
import { OutOfRangeError } from './errors.js';

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    setVerbose(false);
    vi.restoreAllMocks();
  });

  function lines(): Record<string, unknown>[] {
    return vi.mocked(console.log).mock.calls.map((call) => JSON.parse(String(call[0])));
  }

  it('should write one JSON object per line with a timestamp', () => {
    log({ agent: 'vacuum', step: 'runner_start', tick: 0 });

    const [entry] = lines();
    expect(entry).toMatchObject({ agent: 'vacuum', step: 'runner_start', tick: 0 });
    expect(typeof entry?.ts).toBe('string');
  });

  it('should drop verbose entries unless verbose is on', () => {
    logPercept('vacuum', 0, 0, { left: null, right: 1, centre: 0 });
    expect(console.log).not.toHaveBeenCalled();

    setVerbose(true);
    logPercept('vacuum', 0, 0, { left: null, right: 1, centre: 0 });
    logCandidates('vacuum', 0, [{ action: 'move_right', score: -2 }], null);

    expect(lines()).toMatchObject([
      { step: 'percept', details: { position: 0, left: null, right: 1, centre: 0 } },
      { step: 'candidates', details: { candidates: { move_right: -2 }, avoid: null } },
    ]);
  });

  it('should log error name and message', () => {
    logError('vacuum', 4, new OutOfRangeError(7, 3), 'simulation');

    expect(lines()[0]).toMatchObject({
      step: 'error',
      tick: 4,
      details: {
        context: 'simulation',
        name: 'OutOfRangeError',
        message: 'Position 7 is outside the room [0, 3)',
      },
    });
  });
});
