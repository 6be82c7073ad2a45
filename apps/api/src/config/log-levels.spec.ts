import { logLevelsFrom } from './log-levels';

describe('logLevelsFrom', () => {
  it('enables every level up to the threshold', () => {
    expect(logLevelsFrom('error')).toEqual(['error']);
    expect(logLevelsFrom('log')).toEqual(['error', 'warn', 'log']);
    expect(logLevelsFrom('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('falls back to log for a missing or unknown level', () => {
    expect(logLevelsFrom(undefined)).toEqual(['error', 'warn', 'log']);
    expect(logLevelsFrom('loud')).toEqual(['error', 'warn', 'log']);
  });
});
