export type LogLevel = "silent" | "debug";

export type LogOptions = {
  debug?: boolean;
  logLevel?: LogLevel;
  /** Where debug lines go. Defaults to `console.log`. */
  logSink?: (...args: unknown[]) => void;
};

export type Logger = {
  debug: (...args: unknown[]) => void;
};

const isDebugEnabled = (options?: LogOptions): boolean => {
  if (options?.debug !== undefined) {
    return options.debug;
  }

  if (options?.logLevel !== undefined) {
    return options.logLevel === "debug";
  }

  return false;
};

export const createLogger = (options?: LogOptions, scope?: string): Logger => {
  const isDebug = isDebugEnabled(options);
  const sink = options?.logSink ?? console.log;
  const prefix = scope === undefined ? "[mqtt-wire]" : `[mqtt-wire:${scope}]`;

  return {
    debug: (...args: unknown[]) => {
      if (isDebug) {
        sink(prefix, ...args);
      }
    },
  };
};
