import pino from 'pino';
import pretty from 'pino-pretty';

let sharedLogger: pino.Logger | null = null;

const createLogger = (): pino.Logger => {
  const environment = process.env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';

  const loggerConfig: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    base: {
      service: 'fs-toolkit',
      environment,
    },
  };

  if (!isProduction) {
    // stderr keeps stdout clean for piped command output and prompts
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

export const getLogger = (): pino.Logger => {
  sharedLogger ??= createLogger();
  return sharedLogger;
};
