import pino from 'pino';

const level = process.env.LOG_LEVEL ?? (process.env.VITEST ? 'silent' : 'info');

export const logger = pino({
  name: 'playlist-insights',
  level,
});

export type Logger = typeof logger;
