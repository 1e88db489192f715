import { isEventOfType, type DomainEvent, type EventPayload, type EventType } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type Listener = (event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly listeners = new Map<EventType, Map<(event: never) => void, Listener>>();
  private readonly wildcardListeners = new Set<Listener>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const byHandler = this.listeners.get(type) ?? new Map<(event: never) => void, Listener>();
    byHandler.set(handler, (event) => {
      if (isEventOfType(event, type)) handler(event);
    });
    this.listeners.set(type, byHandler);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: Listener): void {
    this.wildcardListeners.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.listeners.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: Listener): void {
    this.wildcardListeners.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const byHandler = this.listeners.get(event.type);
    const targets = [...(byHandler?.values() ?? []), ...this.wildcardListeners];

    for (const listener of targets) {
      try {
        listener(event);
      } catch {
        // A broken subscriber must not stop the run or the remaining subscribers.
      }
    }
  }
}
