export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  log: (message) => console.log(message),
  error: (message) => console.error(message)
};

export const silentLogger: Logger = {
  log: () => undefined,
  error: () => undefined
};

/**
 * Diagnostics go through the logger only in verbose mode; an explicit logger wins.
 */
export function resolveLogger(options: { verbose?: boolean; logger?: Logger }): Logger {
  if (options.logger) {
    return options.logger;
  }
  return options.verbose ? consoleLogger : silentLogger;
}
