import { ConsoleLogger } from "../service/logger";
import { Logger } from "../service/types";
import { HandlerRegistry } from "./handlers";
import { BusEvent, BusPort, EventHandler, EventMap, EventType } from "./types";

/**
 * In-memory bus for tests and single-process development.
 * Handlers run before `publish` resolves; every published event is kept
 * for inspection.
 */
export class MemoryBus implements BusPort {
  private registry: HandlerRegistry;
  private publishedEvents: BusEvent[] = [];
  private logger: Logger;

  constructor(serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(serviceName);
    this.registry = new HandlerRegistry(this.logger);
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void> {
    if (this.registry.add(topic, handler)) {
      this.logger.debug(`Subscribed to topic: ${topic}`);
    }
  }

  async publish(event: BusEvent): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);
    this.publishedEvents.push(event);
    await this.registry.dispatch(event.type, event);
  }

  async close(): Promise<void> {
    this.registry.clear();
    this.publishedEvents = [];
  }

  getPublishedEvents(): BusEvent[] {
    return [...this.publishedEvents];
  }

  clearHistory(): void {
    this.publishedEvents = [];
  }

  getStatus() {
    return {
      subscribedTopics: this.registry.topics(),
      handlerCount: this.registry.handlerCount(),
      publishedEventCount: this.publishedEvents.length,
    };
  }
}

export function createMemoryBus(
  serviceName?: string,
  logger?: Logger
): MemoryBus {
  return new MemoryBus(serviceName, logger);
}
