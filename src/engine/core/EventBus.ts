import { debugSimulation } from '@/utils/debugLogger';
import type { SimulationEventMap, SimulationEventName } from './SimulationEvents';

type EventCallback<T> = (data: T) => void;

/**
 * EventBus - Typed pub/sub event system
 *
 * PERFORMANCE: Uses Map for O(1) unsubscribe instead of O(n) array search
 */
export class EventBus {
  // Map of event name -> Map of subscription ID -> callback
  private events: Map<SimulationEventName, Map<number, EventCallback<never>>> = new Map();
  private nextId = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  public on<K extends SimulationEventName>(
    event: K,
    callback: EventCallback<SimulationEventMap[K]>
  ): () => void {
    const id = this.nextId++;

    let subscriptions = this.events.get(event);
    if (!subscriptions) {
      subscriptions = new Map();
      this.events.set(event, subscriptions);
    }
    subscriptions.set(id, callback);

    return () => this.off(event, id);
  }

  /**
   * Subscribe to an event, automatically unsubscribe after first emit
   */
  public once<K extends SimulationEventName>(
    event: K,
    callback: EventCallback<SimulationEventMap[K]>
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      callback(data);
      unsubscribe();
    });

    return unsubscribe;
  }

  /**
   * Unsubscribe from an event - O(1) complexity
   */
  public off(event: SimulationEventName, id: number): void {
    const subscriptions = this.events.get(event);
    if (!subscriptions) return;

    subscriptions.delete(id);

    if (subscriptions.size === 0) {
      this.events.delete(event);
    }
  }

  /**
   * Emit an event to all subscribers.
   * A throwing handler never stops the remaining handlers; failures are
   * collected and republished on "eventbus:errors".
   */
  public emit<K extends SimulationEventName>(event: K, data: SimulationEventMap[K]): void {
    const subscriptions = this.events.get(event);
    if (!subscriptions || subscriptions.size === 0) return;

    // Snapshot of IDs so handlers may unsubscribe while we iterate
    const handlerIds = Array.from(subscriptions.keys());
    const errors: Array<{ id: number; error: unknown }> = [];

    for (const id of handlerIds) {
      const callback = subscriptions.get(id) as EventCallback<SimulationEventMap[K]> | undefined;
      if (!callback) continue;

      try {
        callback(data);
      } catch (error) {
        errors.push({ id, error });
        debugSimulation.error(`Error in event handler for ${event}:`, error);
      }
    }

    if (errors.length > 0 && event !== 'eventbus:errors' && this.hasListeners('eventbus:errors')) {
      this.emit('eventbus:errors', {
        event,
        errorCount: errors.length,
        errors: errors.map((e) => ({
          handlerId: e.id,
          message: e.error instanceof Error ? e.error.message : String(e.error),
        })),
      });
    }
  }

  /**
   * Clear all subscriptions for an event, or all events
   */
  public clear(event?: SimulationEventName): void {
    if (event) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  public hasListeners(event: SimulationEventName): boolean {
    const subscriptions = this.events.get(event);
    return subscriptions !== undefined && subscriptions.size > 0;
  }

  public listenerCount(event: SimulationEventName): number {
    return this.events.get(event)?.size ?? 0;
  }
}
