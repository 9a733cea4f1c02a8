/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  id: string;
  timestamp: string;
  version?: string;
}

/**
 * Raw update submitted by a webhook handler, the scraper job or an admin
 * form. The payload is validated by the consumer, not by the bus.
 */
export interface PropertyUpdateRequestedEvent extends BaseEvent {
  type: "property_update_requested";
  data: Record<string, unknown>;
}

/**
 * Emitted after a committed create or update of a canonical property.
 * Carries identifiers and field names only, never attribute values.
 */
export interface PropertyChangedEvent extends BaseEvent {
  type: "property_changed";
  data: {
    propertyId: string;
    listingId: string | null;
    version: number;
    change: "create" | "update";
    source: string;
    appliedFields: string[];
    status: string;
    previousStatus: string | null;
  };
}

export interface EventMap {
  property_update_requested: PropertyUpdateRequestedEvent;
  property_changed: PropertyChangedEvent;
}

export type EventType = keyof EventMap;
export type BusEvent = EventMap[EventType];

export type EventHandler<T extends BusEvent = BusEvent> = (
  event: T
) => Promise<void>;

export const EVENT_TYPES: readonly EventType[] = [
  "property_update_requested",
  "property_changed",
];

export function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

export function isBusEvent(value: unknown): value is BusEvent {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || !("id" in value) || !("timestamp" in value)) {
    return false;
  }
  return (
    typeof value.type === "string" &&
    isEventType(value.type) &&
    typeof value.id === "string" &&
    typeof value.timestamp === "string"
  );
}

/**
 * Standard bus port interface
 */
export interface BusPort {
  subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void>;

  publish(event: BusEvent): Promise<void>;

  close?(): Promise<void>;
}

/**
 * Bus configuration options
 */
export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
}
