/**
 * Event Bus Core Implementation
 *
 * Typed in-process event bus. Every event class gets its own pool, holding
 * the subscribers for that class and a queue of deferred values:
 *
 * - trigger() delivers one value to the subscribers immediately
 * - enqueue() stores it until a dispatch call drains the queue
 * - dispatchAllQueued() / dispatchQueued(...types) drain queues in batches
 *
 * Pools live in a slot array indexed by the class's EventTypeId and are
 * created on first reference, so no operation can fail for an unknown event
 * type. Errors thrown while constructing an event or inside a subscriber
 * reach the caller unchanged.
 *
 * Not synchronized: use a bus from the thread that created it.
 */

import type winston from 'winston';
import { getConfig } from '../config/loader';
import type { PoolConfig } from '../config/schema';
import { getLogger } from '../logging/logger';
import { EventBusError, EventBusErrorCode } from './errors';
import { buildEvent, EventPool, type EventPoolHandle } from './pool';
import type { BoundListener, Connection, Listener } from './signal';
import {
  getEventTypeRegistry,
  isEventClass,
  type EventClass,
  type EventConstructor,
  type EventTypeRegistry
} from './type-registry';

/**
 * Event bus configuration options
 */
export interface EventBusOptions extends Partial<PoolConfig> {
  /** Registry assigning pool slots; defaults to the process-wide one */
  registry?: EventTypeRegistry;
  logger?: winston.Logger;
}

export class EventBus {
  private readonly registry: EventTypeRegistry;
  private readonly logger: winston.Logger;
  private readonly poolConfig: Partial<PoolConfig>;
  private readonly pools: Array<EventPoolHandle | undefined> = [];
  private disposed = false;

  constructor(options: EventBusOptions = {}) {
    this.registry = options.registry ?? getEventTypeRegistry();
    this.logger = options.logger ?? getLogger();
    this.poolConfig = {
      maxListeners: options.maxListeners,
      verboseMemoryLeak: options.verboseMemoryLeak
    };
  }

  /**
   * Construct an event from `args` and deliver it to every subscriber now
   *
   * @example bus.trigger(Damage, 10)
   */
  trigger<T, A extends unknown[]>(type: EventConstructor<T, A>, ...args: A): void {
    const pool = this.getPool(type);
    pool.trigger(buildEvent(type, args));
  }

  /**
   * Deliver an already built event to every subscriber of its class now
   *
   * @throws {EventBusError} E_EVENT_001 if `event` is not a class instance
   */
  triggerEvent<T extends object>(event: T): void {
    this.getPool(eventClassOf(event)).trigger(event);
  }

  /**
   * Construct an event from `args` and queue it for the next dispatch
   */
  enqueue<T, A extends unknown[]>(type: EventConstructor<T, A>, ...args: A): void {
    const pool = this.getPool(type);
    pool.enqueue(buildEvent(type, args));
  }

  /**
   * Queue an already built event for the next dispatch
   *
   * @throws {EventBusError} E_EVENT_001 if `event` is not a class instance
   */
  enqueueEvent<T extends object>(event: T): void {
    this.getPool(eventClassOf(event)).enqueue(event);
  }

  /**
   * Drain the queue of every pool that exists, in slot order
   *
   * Pools created by a subscriber during this call are left for the next one.
   *
   * @returns Number of events dispatched
   */
  dispatchAllQueued(): number {
    this.assertUsable();
    let dispatched = 0;
    for (const pool of this.pools.slice()) {
      if (pool) {
        dispatched += pool.dispatchQueued();
      }
    }
    if (dispatched > 0) {
      this.logger.debug(`Dispatched ${dispatched} queued events`);
    }
    return dispatched;
  }

  /**
   * Drain the queues of the given event classes only, in argument order
   *
   * @returns Number of events dispatched
   */
  dispatchQueued(...types: EventClass[]): number {
    this.assertUsable();
    let dispatched = 0;
    for (const type of types) {
      dispatched += this.getPool(type).dispatchQueued();
    }
    if (dispatched > 0) {
      this.logger.debug(`Dispatched ${dispatched} queued events for ${this.describe(types)}`);
    }
    return dispatched;
  }

  /**
   * Discard every pending event of every pool
   *
   * @returns Number of events discarded
   */
  clearAllQueues(): number {
    this.assertUsable();
    let discarded = 0;
    for (const pool of this.pools) {
      if (pool) {
        discarded += pool.clearQueue();
      }
    }
    if (discarded > 0) {
      this.logger.debug(`Discarded ${discarded} queued events`);
    }
    return discarded;
  }

  /**
   * Discard the pending events of the given event classes only
   *
   * @returns Number of events discarded
   */
  clearQueues(...types: EventClass[]): number {
    this.assertUsable();
    let discarded = 0;
    for (const type of types) {
      discarded += this.getPool(type).clearQueue();
    }
    if (discarded > 0) {
      this.logger.debug(`Discarded ${discarded} queued events for ${this.describe(types)}`);
    }
    return discarded;
  }

  /**
   * Subscribe a callable to an event class
   *
   * @example bus.subscribe(Damage, (event) => hud.flash(event.amount))
   */
  subscribe<T>(type: EventClass<T>, listener: Listener<T>): Connection;
  /**
   * Subscribe a method of `target`; it runs with `this` bound to `target`
   *
   * @example bus.subscribe(Damage, player, Player.prototype.onDamage)
   */
  subscribe<T, O>(type: EventClass<T>, target: O, method: BoundListener<O, T>): Connection;
  subscribe<T, O>(
    type: EventClass<T>,
    ...args: [Listener<T>] | [O, BoundListener<O, T>]
  ): Connection {
    const pool = this.getPool(type);
    const connection = args.length === 1
      ? pool.subscribe(args[0])
      : pool.subscribeMethod(args[0], args[1]);

    this.logger.debug(
      `Subscribed ${connection.id} to ${this.registry.describe(type)} (${pool.subscriberCount} subscribers)`
    );
    return connection;
  }

  /**
   * Remove one subscription
   *
   * @returns true if removed, false if the connection was already disconnected
   * @throws {EventBusError} E_EVENT_003 if the owning bus has been shut down
   */
  unsubscribe(connection: Connection): boolean {
    const removed = connection.disconnect();
    if (removed) {
      this.logger.debug(`Unsubscribed ${connection.id}`);
    }
    return removed;
  }

  /**
   * Whether a pool exists for the event class. Never creates one.
   */
  hasPool(type: EventClass): boolean {
    return this.findPool(type) !== undefined;
  }

  /**
   * Number of queued events for the event class. Never creates a pool.
   */
  pendingCount(type: EventClass): number {
    return this.findPool(type)?.pendingCount ?? 0;
  }

  /**
   * Number of subscribers for the event class. Never creates a pool.
   */
  subscriberCount(type: EventClass): number {
    return this.findPool(type)?.subscriberCount ?? 0;
  }

  /**
   * Number of pools created so far
   */
  get poolCount(): number {
    this.assertUsable();
    return this.pools.filter(pool => pool !== undefined).length;
  }

  get isShutdown(): boolean {
    return this.disposed;
  }

  /**
   * Shutdown event bus
   * Drops every queued event and subscriber. Any later call on the bus, or
   * disconnect() on one of its connections, throws E_EVENT_003.
   */
  shutdown(): void {
    if (this.disposed) {
      return;
    }

    let pools = 0;
    for (const pool of this.pools) {
      if (pool instanceof EventPool) {
        pool.dispose();
        pools++;
      }
    }
    this.pools.length = 0;
    this.disposed = true;
    this.logger.info(`Event bus shut down (${pools} pools released)`);
  }

  /**
   * Resolve the pool for an event class, creating it on first reference
   */
  private getPool<T>(type: EventClass<T>): EventPool<T> {
    this.assertUsable();
    const id = this.registry.getEventId(type);

    if (id >= this.pools.length) {
      this.pools.length = id + 1;
    }

    const slot = this.pools[id];
    if (slot === undefined) {
      const label = this.registry.describe(type);
      const pool = new EventPool(type, { ...this.poolConfig, logger: this.logger, label });
      this.pools[id] = pool;
      this.logger.debug(`Created event pool ${label}`);
      return pool;
    }

    return this.checkSlot(slot, type);
  }

  /**
   * Look up the pool for an event class without creating it
   */
  private findPool<T>(type: EventClass<T>): EventPool<T> | undefined {
    this.assertUsable();
    if (!this.registry.has(type)) {
      return undefined;
    }

    const slot = this.pools[this.registry.getEventId(type)];
    return slot === undefined ? undefined : this.checkSlot(slot, type);
  }

  /**
   * Narrow a slot to the pool of `type`. Only a registry that hands one id to
   * two classes can break this.
   */
  private checkSlot<T>(slot: EventPoolHandle, type: EventClass<T>): EventPool<T> {
    if (!(slot instanceof EventPool) || slot.eventType !== type) {
      throw new EventBusError(
        EventBusErrorCode.POOL_MISMATCH,
        `Pool slot for ${this.registry.describe(type)} holds another event class`
      );
    }
    return slot;
  }

  private describe(types: EventClass[]): string {
    return types.map(type => this.registry.describe(type)).join(', ');
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new EventBusError(EventBusErrorCode.DISPOSED);
    }
  }
}

/**
 * Resolve the event class of a pre-built event value
 */
function eventClassOf(event: object): EventClass {
  const type: unknown = event.constructor;
  if (!isEventClass(type)) {
    throw new EventBusError(
      EventBusErrorCode.INVALID_TYPE,
      'Event value must be an instance of an event class, not a plain object',
      { received: typeof event }
    );
  }
  return type;
}

/**
 * Singleton event bus instance
 */
let globalEventBus: EventBus | null = null;

/**
 * Get or create global event bus instance
 *
 * @param options Optional overrides (only used on first call); pool settings
 * default to the loaded configuration
 */
export function getEventBus(options: EventBusOptions = {}): EventBus {
  if (!globalEventBus) {
    const pools = getConfig().pools;
    globalEventBus = new EventBus({
      ...options,
      maxListeners: options.maxListeners ?? pools.maxListeners,
      verboseMemoryLeak: options.verboseMemoryLeak ?? pools.verboseMemoryLeak
    });
  }
  return globalEventBus;
}

/**
 * Reset global event bus instance (useful for testing)
 */
export function resetEventBus(): void {
  if (globalEventBus) {
    globalEventBus.shutdown();
    globalEventBus = null;
  }
}
