/**
 * Typed event emitter and the Cloakroom event map.
 *
 * Payloads carry identities and identifiers only. No event ever
 * includes a plaintext preference, a schedule value or ciphertext bytes.
 *
 * @packageDocumentation
 */

import type { Logger } from './logger';

// ─── Event map ──────────────────────────────────────────────────────────────────

/** Map of event names to their payloads. */
export interface CloakroomEventMap {
  /** A preference record was appended to the ledger. */
  'preference:submitted': { recordId: number; employee: string; timestamp: string };
  /** A team schedule was (re)computed. */
  'team:optimized': { team: string; timestamp: string };
  /** A personal schedule was assigned. */
  'schedule:assigned': { employee: string; team: string; timestamp: string };
  /** A stored schedule was re-derived by an administrative adjustment. */
  'schedule:adjusted': {
    target: string;
    kind: 'team-events' | 'personal-constraints' | 'cross-team';
    timestamp: string;
  };
  /** A decryption request was issued for an employee's schedule. */
  'reveal:requested': { employee: string; requestId: string; timestamp: string };
  /** A pending decryption request was withdrawn by the administrator. */
  'reveal:cancelled': { employee: string; requestId: string; timestamp: string };
  /** A schedule was revealed to its owner. */
  'schedule:revealed': { employee: string; timestamp: string };
}

/** Names of all Cloakroom events. */
export type CloakroomEventName = keyof CloakroomEventMap;

/** A listener for one event. */
export type EventListener<T> = (payload: T) => void;

// ─── TypedEventEmitter ──────────────────────────────────────────────────────────

/**
 * A strongly-typed event emitter with no dependency on Node's `events`.
 *
 * A throwing listener does not prevent later listeners from running; the
 * failure is reported through the optional logger.
 *
 * @example
 * ```typescript
 * const events = new TypedEventEmitter<CloakroomEventMap>();
 * const off = events.on('schedule:revealed', ({ employee }) => notify(employee));
 * off();
 * ```
 */
export class TypedEventEmitter<M extends object> {
  private readonly listeners = new Map<keyof M, Array<EventListener<never>>>();
  private readonly logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /** Register a listener. Returns a function that removes it. */
  on<K extends keyof M>(event: K, listener: EventListener<M[K]>): () => void {
    const list = this.listeners.get(event) ?? [];
    list.push(listener);
    this.listeners.set(event, list);
    return () => this.off(event, listener);
  }

  /** Register a listener that is removed after its first call. */
  once<K extends keyof M>(event: K, listener: EventListener<M[K]>): () => void {
    const wrapper: EventListener<M[K]> = (payload) => {
      off();
      listener(payload);
    };
    const off = this.on(event, wrapper);
    return off;
  }

  off<K extends keyof M>(event: K, listener: EventListener<M[K]>): void {
    const list = this.listeners.get(event);
    if (!list) {
      return;
    }
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
    if (list.length === 0) {
      this.listeners.delete(event);
    }
  }

  /** Deliver a payload to every listener of the event, in registration order. */
  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const list = this.listeners.get(event);
    if (!list) {
      return;
    }
    for (const listener of [...list] as Array<EventListener<M[K]>>) {
      try {
        listener(payload);
      } catch (err) {
        this.logger?.warn('event listener threw', {
          event: String(event),
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  listenerCount<K extends keyof M>(event: K): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  removeAllListeners(event?: keyof M): void {
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }
}

/** The emitter type every Cloakroom component publishes to. */
export type CloakroomEvents = TypedEventEmitter<CloakroomEventMap>;

/** Create an emitter for {@link CloakroomEventMap}. */
export function createEventBus(logger?: Logger): CloakroomEvents {
  return new TypedEventEmitter<CloakroomEventMap>(logger);
}
