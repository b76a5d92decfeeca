import { consoleLogger, Logger, resolveLogger, silentLogger } from '../logger';

describe('resolveLogger', () => {
  it('should stay silent unless verbose', () => {
    expect(resolveLogger({})).toBe(silentLogger);
    expect(resolveLogger({ verbose: false })).toBe(silentLogger);
  });

  it('should write to the console when verbose', () => {
    expect(resolveLogger({ verbose: true })).toBe(consoleLogger);
  });

  it('should prefer an explicit logger', () => {
    const logger: Logger = { log: jest.fn(), error: jest.fn() };

    expect(resolveLogger({ verbose: true, logger })).toBe(logger);
  });

  it('should expose only log and error', () => {
    expect(Object.keys(consoleLogger).sort()).toEqual(['error', 'log']);
    expect(Object.keys(silentLogger).sort()).toEqual(['error', 'log']);
  });
});
