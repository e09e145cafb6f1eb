import { nanoid } from 'nanoid/non-secure';
import pino, { type Logger } from 'pino';

const logger = pino({ name: 'label-sheet-api', level: process.env.LOG_LEVEL ?? 'info' });

export interface RequestLogger {
  requestId: string;
  log: Logger;
}

export function getLogger() {
  return logger;
}

/** Child logger bound to a fresh `<scope>-<id>` request id, also echoed back as `X-Request-Id`. */
export function createRequestLogger(scope: string): RequestLogger {
  const requestId = `${scope}-${nanoid(12)}`;
  return { requestId, log: logger.child({ requestId }) };
}
