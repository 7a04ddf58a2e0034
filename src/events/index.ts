/**
 * Typed Event Bus Module
 *
 * - Per-type event pools with immediate and deferred delivery (EventBus)
 * - Dense event type identifiers (EventTypeRegistry)
 * - Multicast listener lists with revocable connections (Signal, Connection)
 */

// Event Bus Core
export {
  EventBus,
  type EventBusOptions,
  getEventBus,
  resetEventBus
} from './bus';

// Event Pools
export {
  EventPool,
  buildEvent,
  type EventPoolHandle,
  type EventPoolOptions
} from './pool';

// Signals and Connections
export {
  Signal,
  Connection,
  type Listener,
  type BoundListener,
  type SignalOptions
} from './signal';

// Type Registry
export {
  EventTypeRegistry,
  getEventTypeRegistry,
  getEventId,
  isEventClass,
  type EventClass,
  type EventConstructor,
  type EventTypeId
} from './type-registry';

// Errors
export {
  EventBusError,
  EventBusErrorCode,
  ERROR_CATALOG,
  isEventBusError,
  getErrorMetadata,
  formatError,
  type ErrorMetadata
} from './errors';
