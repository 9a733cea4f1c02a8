import {
  NewStatusTransition,
  PageOptions,
  PropertyChangedEvt,
  PropertyFilter,
  PropertyRecord,
  PropertyStatus,
  StatusTransition,
} from "./dto";

export type CreateResult =
  | { created: true; id: string }
  | { created: false; reason: "duplicate_listing" };

export type ConditionalUpdateResult = "success" | "conflict";

// Reads handed to query paths; never writes
export interface PropertyReadPort {
  getByIdentity(propertyId: string): Promise<PropertyRecord | null>;
  getByListingId(listingId: string): Promise<PropertyRecord | null>;
  list(filter: PropertyFilter, page?: PageOptions): Promise<PropertyRecord[]>;
  getTransitions(propertyId: string): Promise<StatusTransition[]>;
}

// Aggregates for the stats path
export interface PropertyAggregatePort {
  countBy(filter: PropertyFilter): Promise<number>;
  countByStatus(): Promise<Record<PropertyStatus, number>>;
  averagePrice(filter: PropertyFilter): Promise<number | null>;
}

/**
 * Persistence of canonical records and their status log.
 *
 * Writes are atomic: the record and its new transitions land together
 * or not at all. `conditionalUpdate` only succeeds while the stored
 * version still equals `expectedVersion`, and bumps nothing itself; the
 * caller hands over the record with its next version.
 */
export interface PropertyStorePort extends PropertyReadPort, PropertyAggregatePort {
  create(
    record: PropertyRecord,
    transitions: NewStatusTransition[]
  ): Promise<CreateResult>;
  conditionalUpdate(
    propertyId: string,
    expectedVersion: number,
    record: PropertyRecord,
    transitions: NewStatusTransition[]
  ): Promise<ConditionalUpdateResult>;
}

// Change notifications; delivery happens after commit
export interface PropertyEventsPort {
  publish(evt: PropertyChangedEvt): Promise<void>;
}
