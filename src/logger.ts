import pino from 'pino';

const nodeEnv = process.env.NODE_ENV || 'development';
const disablePrettyPrint = process.env.DISABLE_PRETTY_PRINT_LOGGING === 'true';

// Command output owns stdout; diagnostics go to stderr
const usePrettyPrint =
  Boolean(process.stderr.isTTY) && !disablePrettyPrint && nodeEnv !== 'production' && nodeEnv !== 'test';

export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'warn',
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'partsync',
      environment: nodeEnv,
    },
    ...(usePrettyPrint && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,service,environment',
          destination: 2,
        },
      },
    }),
  },
  usePrettyPrint ? undefined : pino.destination(2)
);

export function enableVerboseLogging(): void {
  logger.level = 'debug';
}

export default logger;
