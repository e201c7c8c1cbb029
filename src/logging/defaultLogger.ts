import type { Logger } from '../types.js';

export type ConsoleLike = Pick<Console, 'log' | 'warn' | 'error' | 'debug'>;

export class DefaultLogger implements Logger {
  private readonly out: ConsoleLike;

  constructor(out: ConsoleLike = console) {
    this.out = out;
  }

  info(msg: string, meta: object = {}) {
    this.out.log(`INFO: ${msg} - ${JSON.stringify(meta)}`);
  }
  warn(msg: string, meta: object = {}) {
    this.out.warn(`WARN: ${msg} - ${JSON.stringify(meta)}`);
  }
  error(msg: string, meta: object = {}) {
    this.out.error(`ERROR: ${msg} - ${JSON.stringify(meta)}`);
  }
  debug(msg: string, meta: object = {}) {
    if (process.env.DEBUG) {
      this.out.debug(`DEBUG: ${msg} - ${JSON.stringify(meta)}`);
    }
  }
}

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export function resolveLogger(opts: { logger?: Logger; verbose?: boolean }): Logger {
  if (opts.logger) return opts.logger;
  return opts.verbose ? new DefaultLogger() : noopLogger;
}
