import pino from 'pino';

const usePretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'SYS:standard',
        },
      }
    : undefined,
});

export const setLogLevel = (level: pino.LevelWithSilent) => {
  logger.level = level;
};

export const logInfo = (message: string, ...optionalParams: unknown[]) => {
  logger.info(message, ...optionalParams);
};
export const logDebug = (message: string, ...optionalParams: unknown[]) => {
  logger.debug(message, ...optionalParams);
};
export const logWarn = (message: string, ...optionalParams: unknown[]) => {
  logger.warn(message, ...optionalParams);
};
export const logError = (message: string, ...optionalParams: unknown[]) => {
  logger.error(message, ...optionalParams);
};

export default logger;
