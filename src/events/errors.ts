/**
 * Event Bus Error Codes
 *
 * Errors raised by the bus itself. These only ever report a caller
 * precondition violation; failures from event construction or from a
 * subscriber propagate unchanged and are never wrapped in an EventBusError.
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Event bus error codes (E_EVENT_xxx)
 */
export enum EventBusErrorCode {
  /** Pre-built event value has no event class */
  INVALID_TYPE = 'E_EVENT_001',
  /** Pool slot holds a pool for a different event class */
  POOL_MISMATCH = 'E_EVENT_002',
  /** Bus, pool or connection used after shutdown */
  DISPOSED = 'E_EVENT_003'
}

// ============================================================================
// Error Metadata
// ============================================================================

/**
 * Error metadata for each error code
 */
export interface ErrorMetadata {
  code: EventBusErrorCode;
  /** Human-readable description */
  description: string;
  /** Suggested remediation actions */
  remediation: string[];
}

/**
 * Error code catalog
 */
export const ERROR_CATALOG: Record<EventBusErrorCode, ErrorMetadata> = {
  [EventBusErrorCode.INVALID_TYPE]: {
    code: EventBusErrorCode.INVALID_TYPE,
    description: 'Event value is not an instance of an event class',
    remediation: [
      'Declare the event as a class and publish an instance of it',
      'Use trigger(Type, ...args) to construct the value from arguments'
    ]
  },
  [EventBusErrorCode.POOL_MISMATCH]: {
    code: EventBusErrorCode.POOL_MISMATCH,
    description: 'Pool slot belongs to a different event class',
    remediation: [
      'Give each bus a single type registry for its whole lifetime',
      'Do not share pool slots between registries'
    ]
  },
  [EventBusErrorCode.DISPOSED]: {
    code: EventBusErrorCode.DISPOSED,
    description: 'Event bus has been shut down',
    remediation: [
      'Drop connections and bus references once shutdown() has been called',
      'Create a new bus (or call resetEventBus()) before publishing again'
    ]
  }
};

// ============================================================================
// Error Class
// ============================================================================

/**
 * Error thrown by the event bus for precondition violations
 */
export class EventBusError extends Error {
  readonly code: EventBusErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: EventBusErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message ?? ERROR_CATALOG[code].description);
    this.name = 'EventBusError';
    this.code = code;
    this.details = details;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check whether a thrown value is an EventBusError
 */
export function isEventBusError(value: unknown): value is EventBusError {
  return value instanceof EventBusError;
}

/**
 * Get catalog entry for an error code
 */
export function getErrorMetadata(code: EventBusErrorCode): ErrorMetadata {
  return ERROR_CATALOG[code];
}

/**
 * Format error for display
 */
export function formatError(error: EventBusError): string {
  let formatted = `[${error.code}] ${error.message}`;

  const suggestions = ERROR_CATALOG[error.code].remediation;
  if (suggestions.length > 0) {
    formatted += `\n  Suggestions:`;
    suggestions.forEach(suggestion => {
      formatted += `\n    - ${suggestion}`;
    });
  }

  return formatted;
}
