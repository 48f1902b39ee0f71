import { pino, type Logger as PinoLogger } from 'pino';
import { config, type Config } from '../config/index.js';

type FileDestination = ReturnType<typeof pino.destination>;

export interface LoggerHandle {
  logger: PinoLogger;
  /** Flushes pending lines and releases the debug log file, if one is open. */
  close(): void;
}

// stdout carries the protocol, so nothing here may ever write to fd 1.
export function createLogger(options: Pick<Config, 'debug' | 'logging'>): LoggerHandle {
  if (options.debug.enabled) {
    const destination: FileDestination = pino.destination({
      dest: options.debug.file,
      sync: true,
      append: false,
      mkdir: true,
    });
    return {
      logger: pino({ level: 'debug' }, destination),
      close: closeOnce(destination),
    };
  }

  if (options.logging.pretty) {
    return {
      logger: pino({
        level: options.logging.level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      }),
      close: () => undefined,
    };
  }

  const stderr: FileDestination = pino.destination({ dest: 2, sync: true });
  return {
    logger: pino({ level: options.logging.level }, stderr),
    close: () => stderr.flushSync(),
  };
}

function closeOnce(destination: FileDestination): () => void {
  let closed = false;
  return () => {
    if (closed) return;
    closed = true;
    destination.flushSync();
    destination.end();
  };
}

export const rootLogger: LoggerHandle = createLogger(config);

export const logger = rootLogger.logger;

export function closeLogger(): void {
  rootLogger.close();
}
