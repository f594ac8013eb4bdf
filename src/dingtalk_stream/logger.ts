export type StreamLogger = {
  debug?: (m: string) => void;
  info?: (m: string) => void;
  warn?: (m: string) => void;
  error?: (m: string) => void;
};

export type Log = {
  debug: (m: string) => void;
  info: (m: string) => void;
  warn: (m: string) => void;
  error: (m: string) => void;
};

/**
 * Normalise a host logger. Debug lines go to `debug` (or `info` when the host has no debug level)
 * and only when `debug` is enabled.
 */
export function createStreamLogger(logger: StreamLogger | undefined, opts: { debug?: boolean; tag?: string } = {}): Log {
  const prefix = opts.tag ? `[${opts.tag}] ` : "";
  const debugSink = logger?.debug ?? logger?.info;
  return {
    debug: (m) => {
      if (opts.debug) debugSink?.(prefix + m);
    },
    info: (m) => logger?.info?.(prefix + m),
    warn: (m) => logger?.warn?.(prefix + m),
    error: (m) => logger?.error?.(prefix + m),
  };
}

export function consoleLogger(): StreamLogger {
  return {
    debug: (m) => console.log(m),
    info: (m) => console.log(m),
    warn: (m) => console.warn(m),
    error: (m) => console.error(m),
  };
}
