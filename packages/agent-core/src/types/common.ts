/**
 * Logging contract for the core. The host application supplies the implementation
 * (the CLI adapts winston); the core never writes to the console directly.
 */
export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

// Used where no logger is supplied (tests, embedded use)
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
