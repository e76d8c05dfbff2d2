export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Console logger that prefixes every line with `[tag]`. */
export function createLogger(tag = 'tdgate'): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message) => console.debug(prefix, message),
    info: (message) => console.log(prefix, message),
    warn: (message) => console.warn(prefix, message),
    error: (message) => console.error(prefix, message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
