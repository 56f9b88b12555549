import { pino } from 'pino';

export const logger = pino({
  name: 'urban-pipeline',
  level: process.env.LOG_LEVEL ?? 'info',
});
