import pino from 'pino';

const logger = pino({ name: 'label-sheet-labeler', level: process.env.LOG_LEVEL ?? 'info' });

export function getLogger() {
  return logger;
}
