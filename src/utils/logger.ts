/**
 * Library code never writes to the console itself. Anything lossy
 * (a truncated chunk, a discarded checkpoint, a query that fell back to
 * keyword ranking) is reported through the Logger it was handed. The CLI
 * hands over its CommandContext; tests hand over silentLogger or vi.fn().
 */

export interface Logger {
  warn: (message: string) => void;
  debug?: (message: string) => void;
}

/** Used where no logger is passed in */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
