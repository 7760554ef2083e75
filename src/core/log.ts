import pino from 'pino'

import type { LogFields, Logger } from '../types.js'

export function noopLogger(): Logger {
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => logger,
  }
  return logger
}

function wrap(p: pino.Logger): Logger {
  return {
    debug: (msg: string, fields?: LogFields) => p.debug(fields ?? {}, msg),
    info: (msg: string, fields?: LogFields) => p.info(fields ?? {}, msg),
    warn: (msg: string, fields?: LogFields) => p.warn(fields ?? {}, msg),
    error: (msg: string, fields?: LogFields) => p.error(fields ?? {}, msg),
    child: (bindings: LogFields) => wrap(p.child(bindings)),
  }
}

export interface PinoLoggerOptions {
  level?: string
  /**
   * File descriptor to write to. Defaults to stderr so stdout stays free for results.
   */
  fd?: number
}

export function createPinoLogger(opts: PinoLoggerOptions = {}): Logger {
  const p = pino(
    {
      name: 'nixup',
      level: opts.level ?? 'info',
      base: undefined,
    },
    pino.destination({ fd: opts.fd ?? 2, sync: true }),
  )
  return wrap(p)
}
