/**
 * Logger factories
 */

import type { Logger } from '../types/index.js';

export const silentLogger: Logger = () => undefined;

/**
 * Logs to stderr so generated source on stdout stays clean
 */
export function createConsoleLogger(prefix = 'schema-typegen'): Logger {
  return (message, context) => {
    if (context && Object.keys(context).length > 0) {
      console.error(`[${prefix}] ${message}`, context);
    } else {
      console.error(`[${prefix}] ${message}`);
    }
  };
}
