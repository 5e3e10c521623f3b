import pino from 'pino';
import pretty from 'pino-pretty';

export type Logger = pino.Logger;

export const getLogger = (level: string = process.env.LOG_LEVEL ?? 'info'): Logger => {
  const environment = process.env.NODE_ENV ?? 'development';

  const loggerConfig: pino.LoggerOptions = {
    level,
    base: {
      service: 'mcp-ftp',
      environment,
    },
  };

  if (environment === 'development') {
    const prettyStream = pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
      destination: process.stderr,
    });
    return pino(loggerConfig, prettyStream);
  }

  return pino(loggerConfig);
};
