/**
 * Log level configuration
 *
 * Hosts can turn on debug output for the component by setting
 * `localStorage['expandable-text:logLevel'] = 'debug'`.
 */

import { createLogger, formatError, getLogLevel, parseLogLevel, setLogLevel } from '@expandable-text/core';
import type { LogLevel } from '@expandable-text/core/utils/logger';

export const LOG_LEVEL_STORAGE_KEY = 'expandable-text:logLevel';

const log = createLogger('ExpandableText');

/**
 * Apply the log level stored under LOG_LEVEL_STORAGE_KEY, if any.
 * Returns the effective level.
 */
export function configureLogLevelFromStorage(storage?: Pick<Storage, 'getItem'>): LogLevel {
  try {
    const source = storage ?? (typeof localStorage === 'undefined' ? undefined : localStorage);
    const level = parseLogLevel(source?.getItem(LOG_LEVEL_STORAGE_KEY));
    if (level) {
      setLogLevel(level);
    }
  } catch (error) {
    // Storage access can throw (e.g. blocked third-party storage)
    log.warn('Failed to read log level from storage:', formatError(error));
  }
  return getLogLevel();
}
