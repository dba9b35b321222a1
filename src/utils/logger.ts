export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string | Error) => void;
  debug: (msg: string) => void;
  isVerbose: () => boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const verbose = Boolean(opts.verbose);
  return {
    info: (msg) => console.log(msg),
    warn: (msg) => console.warn(`warning: ${msg}`),
    error: (msg) => {
      if (msg instanceof Error) {
        console.error(`error: ${msg.message}`);
        if (verbose && msg.stack) console.error(msg.stack);
        return;
      }
      console.error(`error: ${msg}`);
    },
    debug: (msg) => {
      if (verbose) console.error(`debug: ${msg}`);
    },
    isVerbose: () => verbose,
  };
}
