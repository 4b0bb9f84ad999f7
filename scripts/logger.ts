import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const REDACT_PATHS = [
  'password',
  'appPassword',
  'app_password',
  'credential.appPassword',
  '*.appPassword',
  '*.app_password',
  'auth.pass',
];

export interface LoggerConfig {
  level?: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  prettyPrint?: boolean;
  name?: string;
}

/**
 * Logs go to stderr so that a dry run can print the report on stdout.
 * Pass `destination` to capture output in tests.
 */
export function createLogger(config: LoggerConfig = {}, destination?: DestinationStream): Logger {
  const { level = 'info', prettyPrint = false, name = 'home-report' } = config;

  const options: LoggerOptions = {
    level,
    name,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  if (prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export const silentLogger: Logger = pino({ level: 'silent' });
