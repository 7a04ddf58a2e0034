/**
 * Default Configuration Values
 */

import type { EventBusConfig } from './schema';

/**
 * Default Event Bus Configuration
 *
 * - Leak warning once a single event type passes 50 subscribers
 * - Info-level coloured console logging, no log file
 */
export const DEFAULT_CONFIG: EventBusConfig = {
  pools: {
    maxListeners: 50,
    verboseMemoryLeak: false,
  },
  logging: {
    level: 'info',
    consoleOutput: true,
    noColor: false,
    filePath: undefined,
  },
};
