import { pino } from 'pino';

export const logger = pino({
  name: 'pgdrift',
  level: process.env.LOG_LEVEL || 'info',
});
