/**
 * Event Type Registry
 *
 * Assigns every event class a dense integer identifier the first time the
 * class is seen. Identifiers start at 0, increase by one per new class and
 * are never reused, so they can index the bus's pool slots directly.
 *
 * Registries are plain objects: a bus takes one through its options and
 * falls back to the process-wide default. First use of a class is not
 * synchronized; give each worker thread its own registry and bus.
 */

/**
 * Dense identifier of an event class within one registry
 */
export type EventTypeId = number;

/**
 * Any event class, abstract or concrete. Used as the per-type token.
 */
export type EventClass<T = unknown> = abstract new (...args: never) => T;

/**
 * Concrete event class whose constructor takes `A`
 */
export type EventConstructor<T, A extends unknown[]> = new (...args: A) => T;

export class EventTypeRegistry {
  private readonly ids: Map<EventClass, EventTypeId> = new Map();
  private readonly types: EventClass[] = [];

  /**
   * Get the identifier of an event class, allocating the next one on first use
   */
  getEventId(type: EventClass): EventTypeId {
    const existing = this.ids.get(type);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.types.length;
    this.ids.set(type, id);
    this.types.push(type);
    return id;
  }

  has(type: EventClass): boolean {
    return this.ids.has(type);
  }

  /**
   * Number of identifiers handed out so far
   */
  get size(): number {
    return this.types.length;
  }

  typeAt(id: EventTypeId): EventClass | undefined {
    return this.types[id];
  }

  /**
   * Render `Name#id` for log output. Never allocates an identifier.
   */
  describe(type: EventClass): string {
    const name = type.name || 'AnonymousEvent';
    const id = this.ids.get(type);
    return id === undefined ? `${name}#?` : `${name}#${id}`;
  }
}

/**
 * Check whether a value can serve as an event class token
 *
 * Object literals and null-prototype objects report `Object` or nothing as
 * their constructor and are rejected; arrow functions have no prototype.
 */
export function isEventClass(value: unknown): value is EventClass {
  return typeof value === 'function' && value !== Object && typeof value.prototype === 'object';
}

/**
 * Process-wide registry
 */
let defaultRegistry: EventTypeRegistry | null = null;

/**
 * Get or create the process-wide registry
 */
export function getEventTypeRegistry(): EventTypeRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new EventTypeRegistry();
  }
  return defaultRegistry;
}

/**
 * Identifier of an event class in the process-wide registry
 */
export function getEventId(type: EventClass): EventTypeId {
  return getEventTypeRegistry().getEventId(type);
}
