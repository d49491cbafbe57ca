export interface Logger {
  info: (message: string) => void;
  error: (message: string, cause?: unknown) => void;
}

export function createLogger(source: string): Logger {
  const prefix = `[${source}]`;
  return {
    info(message) {
      if (import.meta.env.DEV) console.info(`${prefix} ${message}`);
      else console.debug(`${prefix} ${message}`);
    },
    error(message, cause) {
      if (cause === undefined) console.error(`${prefix} ${message}`);
      else console.error(`${prefix} ${message}`, cause);
    },
  };
}
