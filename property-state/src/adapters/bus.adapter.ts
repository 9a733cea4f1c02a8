import type {
  BusPort as SharedBusPort,
  PropertyChangedEvent,
} from "@estate-core/shared-utils";
import type { PropertyChangedEvt } from "../core/dto";
import type { PropertyEventsPort } from "../core/ports";

/**
 * Adapter that bridges the shared bus interface with the property state events port
 */
export class BusEventsAdapter implements PropertyEventsPort {
  constructor(private sharedBus: SharedBusPort) {}

  async publish(evt: PropertyChangedEvt): Promise<void> {
    const sharedEvent: PropertyChangedEvent = {
      ...evt,
      data: { ...evt.data, appliedFields: [...evt.data.appliedFields] },
      timestamp: new Date().toISOString(),
      version: "1.0.0",
    };

    return this.sharedBus.publish(sharedEvent);
  }
}
