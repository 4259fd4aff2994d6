/**
 * Event types for the node tree
 *
 * Every concrete event class is built with defineEvent(), which fixes its
 * routing key and bubble flag once, when the class is defined.
 */

import type { EventNode } from './node.js';

export type Severity = 'information' | 'warning' | 'error';

export interface EventOptions {
  /** Re-post to the parent after local handlers run (default true) */
  bubble?: boolean;
  /** Prefix that disambiguates events sharing a name */
  namespace?: string;
}

/**
 * Constructor of a concrete event, with its routing metadata
 */
export type EventClass<E extends NodeEvent = NodeEvent> = (abstract new (...args: never[]) => E) & {
  readonly eventName: string;
  readonly handlerKey: string;
};

export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

export function handlerKeyFor(name: string, namespace?: string): string {
  const base = toSnakeCase(name);
  return namespace ? `on_${namespace}_${base}` : `on_${base}`;
}

export abstract class NodeEvent {
  abstract readonly eventName: string;
  abstract readonly handlerKey: string;
  abstract readonly bubble: boolean;

  private stopped = false;
  private senderRef: WeakRef<EventNode> | undefined = undefined;

  /**
   * Stop propagation to the parent
   */
  stop(): void {
    this.stopped = true;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Node currently dispatching the event, if still alive */
  get sender(): EventNode | undefined {
    return this.senderRef?.deref();
  }

  set sender(node: EventNode | undefined) {
    this.senderRef = node ? new WeakRef(node) : undefined;
  }
}

/**
 * Build the base class for a concrete event type.
 *
 * ```typescript
 * export class SessionDeleteRequested extends defineEvent('SessionDeleteRequested') {
 *   constructor(readonly sessionId: string) { super(); }
 * }
 * ```
 */
export function defineEvent(name: string, options: EventOptions = {}) {
  const key = handlerKeyFor(name, options.namespace);
  const bubble = options.bubble ?? true;

  return class extends NodeEvent {
    static readonly eventName = name;
    static readonly handlerKey = key;
    readonly eventName = name;
    readonly handlerKey = key;
    readonly bubble = bubble;
  };
}

// Log line raised anywhere in the tree; the root decides where it goes
export class LogIt extends defineEvent('LogIt') {
  constructor(
    readonly message: string,
    readonly severity: Severity = 'information',
    readonly notify: boolean = false,
  ) {
    super();
  }
}
