import type { Logger } from "@estate-core/shared-utils";
import { silentLogger } from "@estate-core/shared-utils";
import { vi } from "vitest";
import { MemoryPropertyStore } from "../src/adapters/store.memory";
import { AesGcmCodec } from "../src/core/codec";
import type { NewStatusTransition, PropertyRecord } from "../src/core/dto";
import type { ConditionalUpdateResult } from "../src/core/ports";
import { Reconciler, ReconcilerConfig } from "../src/core/reconcile";
import { StatusRules } from "../src/core/status";
import { TrustPolicy } from "../src/core/trust";

export const TEST_KEY = Buffer.alloc(32, 7);
export const T0 = "2024-03-01T10:00:00.000Z";

export function makeRecord(overrides: Partial<PropertyRecord> = {}): PropertyRecord {
  return {
    id: "prop-1",
    listingId: "MLS123",
    addressCiphertext: null,
    city: null,
    state: null,
    postalCode: null,
    bedrooms: null,
    bathrooms: null,
    squareFeet: null,
    propertyType: null,
    price: null,
    description: null,
    agentName: null,
    officeName: null,
    sourceUrl: null,
    isBookable: null,
    media: [],
    internalNotes: null,
    status: "active",
    statusUpdatedAt: T0,
    provenance: {},
    version: 1,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export interface EngineOptions {
  store?: MemoryPropertyStore;
  logger?: Logger;
  /** Back-off jitter; the midpoint keeps delays at their nominal value */
  random?: () => number;
}

/**
 * Memory store whose reads and version checks take a few milliseconds,
 * so concurrent writers overlap the way they do against a database.
 */
export class SlowMemoryStore extends MemoryPropertyStore {
  constructor(private latencyMs: number) {
    super();
  }

  async getByListingId(listingId: string): Promise<PropertyRecord | null> {
    await pause(this.latencyMs);
    return super.getByListingId(listingId);
  }

  async conditionalUpdate(
    propertyId: string,
    expectedVersion: number,
    record: PropertyRecord,
    transitions: NewStatusTransition[]
  ): Promise<ConditionalUpdateResult> {
    await pause(this.latencyMs);
    return super.conditionalUpdate(propertyId, expectedVersion, record, transitions);
  }
}

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function setupEngine(
  config: Partial<ReconcilerConfig> = {},
  options: EngineOptions = {}
) {
  const store = options.store ?? new MemoryPropertyStore();
  const codec = new AesGcmCodec(TEST_KEY);
  const events = { publish: vi.fn().mockResolvedValue(undefined) };
  let clock = new Date(T0);
  let ids = 0;

  const reconciler = new Reconciler(
    {
      store,
      codec,
      policy: new TrustPolicy(),
      statusRules: new StatusRules(),
      logger: options.logger ?? silentLogger,
      events,
      now: () => clock,
      newId: () => `id-${++ids}`,
      random: options.random ?? (() => 0.5),
    },
    { maxRetries: 3, retryBackoffMs: 0, timeoutMs: 5000, ...config }
  );

  return {
    store,
    codec,
    events,
    reconciler,
    advance(ms: number): void {
      clock = new Date(clock.getTime() + ms);
    },
  };
}
