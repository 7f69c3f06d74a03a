import pino, { type Logger } from 'pino';

/**
 * Root logger for a CLI run. Logs go to stderr so stdout carries only the
 * command's own output; pretty-printed when stderr is a terminal.
 *
 * Level from GAMECRATE_LOG_LEVEL (default: info).
 */
export function createLogger(level: string = process.env['GAMECRATE_LOG_LEVEL'] ?? 'info'): Logger {
  if (process.stderr.isTTY) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          ignore: 'pid,hostname',
        },
      },
    });
  }
  return pino({ level }, pino.destination(2));
}
