/**
 * Diagnostics sink. Defaults to the global console; lines are prefixed with
 * the component in brackets, e.g. "[pool] reuse example.com:443".
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  debug: message => console.debug(message),
  warn: message => console.warn(message),
};

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
