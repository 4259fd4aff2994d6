/**
 * Event Node - tree participant that dispatches and bubbles events
 *
 * Nodes never hold a reference to their parent. Each node gets a handle in the
 * arena on construction and stores only its parent's handle; the arena keeps
 * weak references, so a dropped subtree is collected normally.
 */

import { randomUUID } from 'crypto';
import { InvariantError, getErrorMessage } from './errors.js';
import { LogIt, type EventClass, type NodeEvent, type Severity } from './events.js';
import { logger } from './logger.js';

// ============================================================================
// Arena
// ============================================================================

export class NodeArena {
  private nextHandle = 1;
  private readonly slots = new Map<number, WeakRef<EventNode>>();
  private readonly cleanup = new FinalizationRegistry<number>((handle) => {
    this.slots.delete(handle);
  });

  register(node: EventNode): number {
    const handle = this.nextHandle++;
    this.slots.set(handle, new WeakRef(node));
    this.cleanup.register(node, handle);
    return handle;
  }

  resolve(handle: number | undefined): EventNode | undefined {
    if (handle === undefined) return undefined;
    return this.slots.get(handle)?.deref();
  }

  get size(): number {
    return this.slots.size;
  }
}

export const arena = new NodeArena();

// ============================================================================
// Handler tables
// ============================================================================

export type Handler<N> = (node: N, event: NodeEvent) => void | Promise<void>;

interface HandlerSlot<N> {
  public?: Handler<N>;
  private?: Handler<N>;
}

/**
 * Statically declared event → handler table for one node class.
 * Tables chain to the table of the base class; resolution runs most-derived
 * first and, at each level, a private handler replaces the public one.
 */
export class HandlerTable<N> {
  private readonly slots = new Map<string, HandlerSlot<N>>();
  private readonly cache = new Map<string, Handler<N>[]>();

  constructor(private readonly base?: HandlerTable<N>) {}

  on<E extends NodeEvent>(type: EventClass<E>, fn: (node: N, event: E) => void | Promise<void>): this {
    return this.register(type, fn, 'public');
  }

  onPrivate<E extends NodeEvent>(type: EventClass<E>, fn: (node: N, event: E) => void | Promise<void>): this {
    return this.register(type, fn, 'private');
  }

  resolve(handlerKey: string): readonly Handler<N>[] {
    const cached = this.cache.get(handlerKey);
    if (cached) return cached;

    const handlers: Handler<N>[] = [];
    for (let table: HandlerTable<N> | undefined = this; table; table = table.base) {
      const slot = table.slots.get(handlerKey);
      const handler = slot?.private ?? slot?.public;
      if (handler) handlers.push(handler);
    }
    this.cache.set(handlerKey, handlers);
    return handlers;
  }

  private register<E extends NodeEvent>(
    type: EventClass<E>,
    fn: (node: N, event: E) => void | Promise<void>,
    visibility: keyof HandlerSlot<N>,
  ): this {
    const slot = this.slots.get(type.handlerKey) ?? {};
    slot[visibility] = (node, event) => {
      if (event instanceof type) return fn(node, event);
    };
    this.slots.set(type.handlerKey, slot);
    this.cache.clear();
    return this;
  }
}

// ============================================================================
// Delivery tracking
// ============================================================================

const inFlight = new Set<Promise<void>>();

function track(delivery: Promise<void>): void {
  inFlight.add(delivery);
  const done = () => {
    inFlight.delete(delivery);
  };
  void delivery.then(done, done);
}

/**
 * Resolve once every posted event has finished delivering
 */
export async function settled(): Promise<void> {
  while (inFlight.size > 0) {
    await Promise.allSettled([...inFlight]);
  }
}

// ============================================================================
// Node
// ============================================================================

/** Fresh node id: a UUID without dashes */
export function newNodeId(): string {
  return randomUUID().replace(/-/g, '');
}

export class EventNode {
  private nodeId: string;
  readonly handle: number;
  private parentHandle: number | undefined = undefined;

  constructor(id?: string) {
    this.nodeId = id || newNodeId();
    this.handle = arena.register(this);
  }

  get id(): string {
    return this.nodeId;
  }

  protected assignId(id: string): void {
    this.nodeId = id;
  }

  get parent(): EventNode | undefined {
    return arena.resolve(this.parentHandle);
  }

  /**
   * Mount a child node. The only way a node gets a parent.
   */
  mount(child: EventNode): void {
    const current = child.parent;
    if (current === this) return;
    if (current) {
      throw new InvariantError(`Node ${child.id} is already mounted under ${current.id}`);
    }
    for (let node: EventNode | undefined = this; node; node = node.parent) {
      if (node === child) {
        throw new InvariantError(`Mounting ${child.id} under ${this.id} would create a cycle`);
      }
    }
    child.parentHandle = this.handle;
    child.onMount();
  }

  unmount(child: EventNode): void {
    if (child.parentHandle === this.handle) {
      child.parentHandle = undefined;
    }
  }

  protected onMount(): void {}

  /**
   * Schedule delivery of an event to this node (and its ancestors).
   * The promise settles when delivery finishes; handler errors reject it.
   */
  post(event: NodeEvent): Promise<void> {
    const delivery = Promise.resolve().then(() => this.dispatch(event));
    track(delivery);
    return delivery;
  }

  /**
   * Fire-and-forget post; a failing handler is logged
   */
  emit(event: NodeEvent): void {
    void this.post(event).catch((error: unknown) => {
      logger.error(`Delivery of ${event.eventName} from ${this.id} failed: ${getErrorMessage(error)}`, error);
    });
  }

  /**
   * Log a message through the tree
   */
  logIt(message: string, severity: Severity = 'information', notify = false): void {
    this.emit(new LogIt(message, severity, notify));
  }

  protected handlerTable(): HandlerTable<this> {
    return nodeHandlers;
  }

  /**
   * Catch-all hook, runs after the typed handlers of every event
   */
  protected onEvent(_event: NodeEvent): void | Promise<void> {}

  private async dispatch(event: NodeEvent): Promise<void> {
    event.sender = this;
    for (const handler of this.handlerTable().resolve(event.handlerKey)) {
      await handler(this, event);
    }
    await this.onEvent(event);

    const parent = this.parent;
    if (event.bubble && !event.isStopped && parent) {
      await parent.post(event);
    }
  }
}

function writeLog(event: LogIt): void {
  switch (event.severity) {
    case 'error':
      logger.error(event.message);
      break;
    case 'warning':
      logger.warn(event.message);
      break;
    default:
      logger.info(event.message);
  }
}

// Log events that reach a root nobody else handles go to the process logger
export const nodeHandlers = new HandlerTable<EventNode>().on(LogIt, (node, event) => {
  if (!node.parent) writeLog(event);
});
