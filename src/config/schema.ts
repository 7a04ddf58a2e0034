/**
 * Configuration Schema Definition
 *
 * Defines TypeScript interfaces and Zod schemas for runtime validation
 * of event bus configuration settings.
 */

import { z } from 'zod';

/**
 * Pool Configuration
 *
 * Settings applied to the subscriber list of every event pool.
 */
export interface PoolConfig {
  /**
   * Subscriber count per event type above which the emitter prints a
   * possible-leak warning. 0 disables the warning.
   *
   * @default 50
   * @minimum 0
   * @example 200
   */
  maxListeners: number;

  /**
   * Whether the leak warning names the event and listener count.
   *
   * @default false
   */
  verboseMemoryLeak: boolean;
}

/**
 * Logging Configuration
 *
 * Controls logging behavior, output destinations, and verbosity.
 */
export interface LoggingConfig {
  /**
   * Log level controlling verbosity of output.
   *
   * - "debug": pool creation, subscriptions and dispatch batches
   * - "info": bus shutdown
   * - "warn": dispatches aborted by a subscriber
   * - "error": errors only
   *
   * @default "info"
   * @example "debug"
   */
  level: 'debug' | 'info' | 'warn' | 'error';

  /**
   * Optional file path for log output. If undefined, only console logging is used.
   *
   * @default undefined
   * @example ".typed-event-bus/bus.log"
   */
  filePath?: string;

  /**
   * Whether to output logs to console.
   *
   * @default true
   */
  consoleOutput: boolean;

  /**
   * Disable chalk colours in console output.
   *
   * @default false
   */
  noColor: boolean;
}

/**
 * Event Bus Configuration
 *
 * Complete configuration structure combining all configuration sections.
 */
export interface EventBusConfig {
  pools: PoolConfig;
  logging: LoggingConfig;
}

/**
 * Zod Schema for Pool Configuration
 */
export const PoolConfigSchema = z.object({
  maxListeners: z.number().int().min(0, {
    message: 'maxListeners must be a non-negative integer (0 = unlimited)',
  }),
  verboseMemoryLeak: z.boolean(),
});

/**
 * Zod Schema for Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  filePath: z.string().min(1).optional(),
  consoleOutput: z.boolean(),
  noColor: z.boolean(),
});

/**
 * Complete Event Bus Configuration Schema
 */
export const EventBusConfigSchema = z.object({
  pools: PoolConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Type alias for validated configuration
 */
export type ValidatedEventBusConfig = z.infer<typeof EventBusConfigSchema>;
