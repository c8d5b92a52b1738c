import pino from 'pino';
import { getConfig } from './config.js';

function createLogger(): pino.Logger {
  const { FOLIO_LOG_LEVEL, FOLIO_LOG_FILE } = getConfig();
  // stdout and stderr belong to the terminal UI
  if (!FOLIO_LOG_FILE) return pino({ level: 'silent' });
  return pino(
    { level: FOLIO_LOG_LEVEL },
    pino.destination({ dest: FOLIO_LOG_FILE, sync: false, mkdir: true }),
  );
}

export const logger = createLogger();
