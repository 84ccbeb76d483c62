import pino from 'pino';

// Components take this narrow shape so tests can pass plain stubs.
export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LoggerOptions = {
  level?: string;
  pretty?: boolean;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || 'info';
  const base = options.pretty
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard' },
        },
      })
    : pino({ level });

  return {
    debug: (msg) => base.debug(msg),
    info: (msg) => base.info(msg),
    warn: (msg) => base.warn(msg),
    error: (msg) => base.error(msg),
  };
}
