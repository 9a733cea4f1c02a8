import { Logger } from "../service/types";
import { EVENT_TYPES, EventHandler, EventMap, EventType } from "./types";

/**
 * Per-topic handler registry shared by the bus implementations
 */
export class HandlerRegistry {
  private handlers: { [K in EventType]?: EventHandler<EventMap[K]>[] } = {};

  constructor(private logger: Logger) {}

  /**
   * Returns true when this is the first handler for the topic
   */
  add<K extends EventType>(topic: K, handler: EventHandler<EventMap[K]>): boolean {
    const existing = this.handlers[topic];
    if (existing) {
      existing.push(handler);
      return false;
    }
    const handlers: { [P in K]?: EventHandler<EventMap[P]>[] } = this.handlers;
    handlers[topic] = [handler];
    return true;
  }

  /**
   * Run every handler for the event; a failing handler does not stop the others
   */
  async dispatch<K extends EventType>(topic: K, event: EventMap[K]): Promise<void> {
    const handlers = this.handlers[topic] ?? [];

    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Handler error for ${topic} (${event.id}):`, error);
        }
      })
    );
  }

  topics(): EventType[] {
    return EVENT_TYPES.filter(
      (topic) => (this.handlers[topic]?.length ?? 0) > 0
    );
  }

  handlerCount(): number {
    return this.topics().reduce(
      (sum, topic) => sum + (this.handlers[topic]?.length ?? 0),
      0
    );
  }

  clear(): void {
    this.handlers = {};
  }
}
