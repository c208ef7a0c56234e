import { pino, type Logger } from 'pino';
import type { ExportContext } from '../export/context.js';

import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';

export type { Logger };

export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: {
    system: 'record-export'
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with the export run's session attached.
 */
export function getContextLogger(context: ExportContext, parent: Logger = logger): Logger {
  return parent.child({
    sessionIdentifier: context.sessionIdentifier,
    instrumentPid: context.instrumentPid
  });
}
