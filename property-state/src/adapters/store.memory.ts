import {
  NewStatusTransition,
  PageOptions,
  PropertyFilter,
  PropertyRecord,
  PropertyStatus,
  StatusTransition,
} from "../core/dto";
import { StoreUnavailableError, ValidationError } from "../core/errors";
import {
  ConditionalUpdateResult,
  CreateResult,
  PropertyStorePort,
} from "../core/ports";
import { emptyStatusCounts } from "../core/status";

function copyRecord(record: PropertyRecord): PropertyRecord {
  return { ...record, media: [...record.media], provenance: { ...record.provenance } };
}

function sameText(a: string | null, b: string): boolean {
  return a !== null && a.toLowerCase() === b.toLowerCase();
}

export function matchesFilter(record: PropertyRecord, filter: PropertyFilter): boolean {
  if (filter.statuses && !filter.statuses.includes(record.status)) return false;
  if (filter.city !== undefined && !sameText(record.city, filter.city)) return false;
  if (
    filter.propertyType !== undefined &&
    !sameText(record.propertyType, filter.propertyType)
  ) {
    return false;
  }
  return true;
}

/**
 * In-memory property store for tests and local development.
 * Hands out copies, so callers can never mutate stored state.
 */
export class MemoryPropertyStore implements PropertyStorePort {
  private records = new Map<string, PropertyRecord>();
  private listingIndex = new Map<string, string>();
  private transitions = new Map<string, StatusTransition[]>();
  private unavailable = false;

  async getByIdentity(propertyId: string): Promise<PropertyRecord | null> {
    this.ensureAvailable("getByIdentity");
    const record = this.records.get(propertyId);
    return record ? copyRecord(record) : null;
  }

  async getByListingId(listingId: string): Promise<PropertyRecord | null> {
    this.ensureAvailable("getByListingId");
    const propertyId = this.listingIndex.get(listingId);
    return propertyId === undefined ? null : this.getByIdentity(propertyId);
  }

  async list(filter: PropertyFilter, page: PageOptions = {}): Promise<PropertyRecord[]> {
    this.ensureAvailable("list");
    const offset = page.offset ?? 0;
    const limit = page.limit ?? 100;

    return [...this.records.values()]
      .filter((record) => matchesFilter(record, filter))
      .sort(
        (a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id)
      )
      .slice(offset, offset + limit)
      .map(copyRecord);
  }

  async create(
    record: PropertyRecord,
    transitions: NewStatusTransition[]
  ): Promise<CreateResult> {
    this.ensureAvailable("create");
    if (record.listingId !== null && this.listingIndex.has(record.listingId)) {
      return { created: false, reason: "duplicate_listing" };
    }
    if (this.records.has(record.id)) {
      throw new ValidationError(`Property ${record.id} already exists`, {
        propertyId: record.id,
      });
    }

    this.records.set(record.id, copyRecord(record));
    if (record.listingId !== null) {
      this.listingIndex.set(record.listingId, record.id);
    }
    this.appendTransitions(record.id, transitions);
    return { created: true, id: record.id };
  }

  async conditionalUpdate(
    propertyId: string,
    expectedVersion: number,
    record: PropertyRecord,
    transitions: NewStatusTransition[]
  ): Promise<ConditionalUpdateResult> {
    this.ensureAvailable("conditionalUpdate");
    const stored = this.records.get(propertyId);
    if (!stored || stored.version !== expectedVersion) {
      return "conflict";
    }

    if (record.listingId !== null && record.listingId !== stored.listingId) {
      const owner = this.listingIndex.get(record.listingId);
      if (owner !== undefined && owner !== propertyId) {
        throw new ValidationError(
          `Listing ${record.listingId} is already bound to another property`,
          { listingId: record.listingId, propertyId }
        );
      }
      this.listingIndex.set(record.listingId, propertyId);
    }

    this.records.set(propertyId, copyRecord({ ...record, id: propertyId }));
    this.appendTransitions(propertyId, transitions);
    return "success";
  }

  async getTransitions(propertyId: string): Promise<StatusTransition[]> {
    this.ensureAvailable("getTransitions");
    return (this.transitions.get(propertyId) ?? []).map((entry) => ({ ...entry }));
  }

  async countBy(filter: PropertyFilter): Promise<number> {
    this.ensureAvailable("countBy");
    let count = 0;
    for (const record of this.records.values()) {
      if (matchesFilter(record, filter)) count++;
    }
    return count;
  }

  async countByStatus(): Promise<Record<PropertyStatus, number>> {
    this.ensureAvailable("countByStatus");
    const counts = emptyStatusCounts();
    for (const record of this.records.values()) {
      counts[record.status]++;
    }
    return counts;
  }

  async averagePrice(filter: PropertyFilter): Promise<number | null> {
    this.ensureAvailable("averagePrice");
    const prices: number[] = [];
    for (const record of this.records.values()) {
      if (record.price !== null && matchesFilter(record, filter)) {
        prices.push(record.price);
      }
    }
    if (prices.length === 0) return null;
    return prices.reduce((sum, price) => sum + price, 0) / prices.length;
  }

  // Test helper methods
  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  /**
   * Overwrite a stored record as-is, bypassing every check
   */
  put(record: PropertyRecord): void {
    this.records.set(record.id, copyRecord(record));
    if (record.listingId !== null) {
      this.listingIndex.set(record.listingId, record.id);
    }
  }

  size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
    this.listingIndex.clear();
    this.transitions.clear();
  }

  private appendTransitions(
    propertyId: string,
    transitions: NewStatusTransition[]
  ): void {
    const log = this.transitions.get(propertyId) ?? [];
    for (const transition of transitions) {
      log.push({ ...transition, propertyId, sequence: log.length + 1 });
    }
    this.transitions.set(propertyId, log);
  }

  private ensureAvailable(operation: string): void {
    if (this.unavailable) {
      throw new StoreUnavailableError(operation, new Error("memory store offline"));
    }
  }
}
