import { randomUUID } from "crypto";
import { Logger } from "@estate-core/shared-utils";
import {
  ConflictResolution,
  ConflictResolutionRequest,
  ConflictResolutionResult,
  FieldProvenance,
  NewStatusTransition,
  PropertyAttributes,
  PropertyChangedEvt,
  PropertyRecord,
  PropertyState,
  PropertyUpdateRequest,
  Provenance,
  ReconcileOptions,
  ReconcileOutcome,
  ReconcileResult,
  SourceKind,
  SyncHealth,
} from "./dto";
import { FieldCodec } from "./codec";
import {
  ConcurrentUpdateError,
  PropertyNotFoundError,
  ReconcileTimeoutError,
  StoreUnavailableError,
  ValidationError,
} from "./errors";
import { mergeUpdate, MergeResult, StoredAddress } from "./merge";
import { PropertyEventsPort, PropertyStorePort } from "./ports";
import { readAddress, toPropertyState } from "./reader";
import { INITIAL_STATUS, StatusRules } from "./status";
import { TrustPolicy } from "./trust";
import { parseConflictResolution, parseUpdateRequest } from "./validation";

export interface ReconcilerConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Back-off before retry n is about `retryBackoffMs * n`, jittered by ±50% */
  retryBackoffMs: number;
  timeoutMs: number;
}

export interface ReconcilerDeps {
  store: PropertyStorePort;
  codec: FieldCodec;
  policy: TrustPolicy;
  statusRules: StatusRules;
  logger: Logger;
  events?: PropertyEventsPort;
  /** Wall clock used for timestamps */
  now?: () => Date;
  newId?: () => string;
  /** Source of back-off jitter, in [0, 1) */
  random?: () => number;
}

type Attempt =
  | { kind: "committed"; result: ReconcileResult; previous: PropertyRecord | null }
  | { kind: "noop"; result: ReconcileResult };

// Who holds a field after each resolution
const RESOLUTION_HOLDERS: Record<ConflictResolution, Omit<FieldProvenance, "at">> = {
  manual_override: { source: "admin", sourceName: "manual_override" },
  listing_authoritative: { source: "listing_sync", sourceName: "listing_authoritative" },
  crm_authoritative: { source: "crm", sourceName: "crm_authoritative" },
};

interface Resolved {
  request: PropertyUpdateRequest;
  source: SourceKind;
  observedAt: string;
  key: string;
}

const EMPTY_ATTRIBUTES: PropertyAttributes = {
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
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Merges updates from competing sources into the canonical record.
 *
 * Each attempt reads the current version, merges in memory and writes
 * back with a version check. A lost race re-reads and re-merges, so no
 * write is ever applied on top of a stale read.
 */
export class Reconciler {
  private health = {
    reconciles: 0,
    conflictsRetried: 0,
    conflictsExhausted: 0,
    eventsFailed: 0,
  };
  private now: () => Date;
  private newId: () => string;
  private random: () => number;

  constructor(private deps: ReconcilerDeps, private config: ReconcilerConfig) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
    this.random = deps.random ?? Math.random;
  }

  async reconcile(
    input: PropertyUpdateRequest,
    options: ReconcileOptions = {}
  ): Promise<ReconcileResult> {
    const request = parseUpdateRequest(input);
    const resolved: Resolved = {
      request,
      source: this.deps.policy.resolveSource(request.source),
      observedAt: request.observedAt ?? this.now().toISOString(),
      key: request.listingId ?? request.propertyId ?? "unknown",
    };

    const { logger } = this.deps;

    const outcome = await this.retrying(resolved.key, options, (attempt) =>
      this.attempt(resolved, attempt)
    );
    this.health.reconciles++;

    if (outcome.kind === "committed") {
      const { state } = outcome.result;
      logger.info(
        `Reconciled ${resolved.key} from ${request.source}: ${outcome.result.outcome.change} v${state.version}`,
        { propertyId: state.id, applied: outcome.result.outcome.appliedFields }
      );
      await this.announce(outcome.result, outcome.previous, request.source);
    }
    return outcome.result;
  }

  /**
   * Hand a contended field to the holder a resolution names, so the
   * next write is ranked against that holder. Values are untouched.
   */
  async resolveConflict(
    propertyId: string,
    field: string,
    resolution: string,
    options: ReconcileOptions = {}
  ): Promise<ConflictResolutionResult> {
    const request = parseConflictResolution({ propertyId, field, resolution });
    if (this.deps.policy.modeOf(request.field) === "exempt") {
      throw new ValidationError(`Field ${request.field} has no holder to resolve`, {
        field: request.field,
      });
    }

    const result = await this.retrying(request.propertyId, options, (attempt) =>
      this.tryResolve(request, attempt)
    );
    this.deps.logger.info(
      `Resolved ${request.field} on ${request.propertyId} for ${result.holder.source} (${request.resolution})`,
      { version: result.state.version, previousHolder: result.previousHolder?.source ?? null }
    );
    return result;
  }

  /**
   * Move a listing's status on behalf of a source.
   */
  async updateStatus(
    listingId: string,
    status: string,
    source: string,
    options?: ReconcileOptions
  ): Promise<ReconcileResult> {
    return this.reconcile({ source, listingId, status }, options);
  }

  getHealth(): SyncHealth {
    const degraded =
      this.health.conflictsExhausted > 0 || this.health.eventsFailed > 0;
    return { status: degraded ? "degraded" : "operational", ...this.health };
  }

  /**
   * Run `attempt` until it commits, re-reading on every version conflict.
   * Back-off grows linearly with jitter so writers that collided do not
   * wake up together.
   */
  private async retrying<T>(
    key: string,
    options: ReconcileOptions,
    attempt: (n: number) => Promise<T | "conflict">
  ): Promise<T> {
    const { logger } = this.deps;
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const deadline = Date.now() + timeoutMs;

    for (let n = 0; ; n++) {
      if (Date.now() > deadline) {
        throw new ReconcileTimeoutError(key, timeoutMs, n);
      }

      let result: T | "conflict";
      try {
        result = await attempt(n);
      } catch (error) {
        if (error instanceof StoreUnavailableError) {
          logger.error(`Store failure while reconciling ${key}:`, error);
        }
        throw error;
      }
      if (result !== "conflict") return result;

      if (n >= this.config.maxRetries) {
        this.health.conflictsExhausted++;
        logger.warn(`Giving up on ${key} after ${n} retries on version conflicts`);
        throw new ConcurrentUpdateError(key, n);
      }

      this.health.conflictsRetried++;
      const delay = Math.round(
        this.config.retryBackoffMs * (n + 1) * (0.5 + this.random())
      );
      logger.debug(`Version conflict on ${key}, retry ${n + 1} in ${delay}ms`);
      if (Date.now() + delay > deadline) {
        throw new ReconcileTimeoutError(key, timeoutMs, n + 1);
      }
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  private async attempt(
    resolved: Resolved,
    attempt: number
  ): Promise<Attempt | "conflict"> {
    const current = await this.resolveTarget(resolved.request);
    return current
      ? this.tryUpdate(current, resolved, attempt)
      : this.tryCreate(resolved, attempt);
  }

  private async tryResolve(
    request: ConflictResolutionRequest,
    attempt: number
  ): Promise<ConflictResolutionResult | "conflict"> {
    const { store, codec, logger } = this.deps;
    const current = await store.getByIdentity(request.propertyId);
    if (!current) {
      throw new PropertyNotFoundError(request.propertyId);
    }

    const now = this.now().toISOString();
    const holder: FieldProvenance = { ...RESOLUTION_HOLDERS[request.resolution], at: now };
    const provenance: Provenance = { ...current.provenance };
    provenance[request.field] = holder;

    const record: PropertyRecord = {
      ...current,
      media: [...current.media],
      provenance,
      version: current.version + 1,
      updatedAt: now,
    };
    const transitions: NewStatusTransition[] = [];
    // Taking over status is logged even though the status itself stays
    if (request.field === "status") {
      record.statusUpdatedAt = now;
      transitions.push({
        from: current.status,
        to: current.status,
        source: holder.source,
        sourceName: holder.sourceName,
        at: now,
      });
    }

    const written = await store.conditionalUpdate(
      current.id,
      current.version,
      record,
      transitions
    );
    if (written === "conflict") return "conflict";

    return {
      state: toPropertyState(record, readAddress(codec, record, logger)),
      field: request.field,
      resolution: request.resolution,
      holder,
      previousHolder: current.provenance[request.field] ?? null,
      retries: attempt,
    };
  }

  private async resolveTarget(
    request: PropertyUpdateRequest
  ): Promise<PropertyRecord | null> {
    const { store } = this.deps;
    const { listingId, propertyId } = request;

    if (listingId !== undefined) {
      const byListing = await store.getByListingId(listingId);
      if (byListing) {
        if (propertyId !== undefined && byListing.id !== propertyId) {
          throw new ValidationError(
            `Listing ${listingId} belongs to a different property`,
            { listingId, propertyId, actualPropertyId: byListing.id }
          );
        }
        return byListing;
      }
    }

    if (propertyId === undefined) return null;

    const byId = await store.getByIdentity(propertyId);
    if (!byId) {
      throw new PropertyNotFoundError(propertyId);
    }
    if (
      listingId !== undefined &&
      byId.listingId !== null &&
      byId.listingId !== listingId
    ) {
      throw new ValidationError(
        `Property ${propertyId} is bound to a different listing`,
        { listingId, propertyId, actualListingId: byId.listingId }
      );
    }
    return byId;
  }

  private async tryUpdate(
    current: PropertyRecord,
    resolved: Resolved,
    attempt: number
  ): Promise<Attempt | "conflict"> {
    // Only decrypt when the request has an address to compare against
    const storedAddress: StoredAddress | null =
      resolved.request.address === undefined
        ? null
        : readAddress(this.deps.codec, current, this.deps.logger);

    const merged = this.merge(
      current,
      storedAddress ?? { readable: true, value: null },
      resolved
    );

    if (merged.outcome.appliedFields.length === 0) {
      return {
        kind: "noop",
        result: {
          state: toPropertyState(
            current,
            storedAddress ?? readAddress(this.deps.codec, current, this.deps.logger)
          ),
          outcome: { ...merged.outcome, change: "noop", retries: attempt },
        },
      };
    }

    const record = this.seal(merged, current.version + 1);
    const written = await this.deps.store.conditionalUpdate(
      current.id,
      current.version,
      record,
      merged.transitions
    );
    if (written === "conflict") return "conflict";

    return {
      kind: "committed",
      previous: current,
      result: {
        state: this.stateOf(record, merged),
        outcome: { ...merged.outcome, change: "update", retries: attempt },
      },
    };
  }

  /**
   * A new property starts out as pending_images at version 0; the
   * request is merged into that base and stored as version 1.
   */
  private async tryCreate(
    resolved: Resolved,
    attempt: number
  ): Promise<Attempt | "conflict"> {
    const { request, source, observedAt } = resolved;
    const { listingId } = request;

    if (listingId === undefined) {
      throw new ValidationError("listingId is required to create a property", {
        field: "listingId",
      });
    }
    if (request.address === undefined) {
      throw new ValidationError("address is required to create a property", {
        field: "address",
        listingId,
      });
    }

    const now = this.now().toISOString();
    const base: PropertyRecord = {
      ...EMPTY_ATTRIBUTES,
      id: this.newId(),
      listingId,
      addressCiphertext: null,
      media: [],
      internalNotes: null,
      status: INITIAL_STATUS,
      statusUpdatedAt: now,
      provenance: {
        status: { source, sourceName: request.source, at: observedAt },
      },
      version: 0,
      createdAt: now,
      updatedAt: now,
    };

    const merged = this.merge(base, { readable: true, value: null }, resolved);
    const record = this.seal(merged, 1);
    const transitions = [
      {
        from: null,
        to: INITIAL_STATUS,
        source,
        sourceName: request.source,
        at: now,
      },
      ...merged.transitions,
    ];

    const created = await this.deps.store.create(record, transitions);
    if (!created.created) return "conflict";

    return {
      kind: "committed",
      previous: null,
      result: {
        state: this.stateOf(record, merged),
        outcome: { ...merged.outcome, change: "create", retries: attempt },
      },
    };
  }

  private merge(
    current: PropertyRecord,
    storedAddress: StoredAddress,
    resolved: Resolved
  ): MergeResult {
    return mergeUpdate(current, storedAddress, resolved.request, {
      policy: this.deps.policy,
      statusRules: this.deps.statusRules,
      source: resolved.source,
      sourceName: resolved.request.source,
      observedAt: resolved.observedAt,
      now: this.now().toISOString(),
    });
  }

  private seal(merged: MergeResult, version: number): PropertyRecord {
    const addressCiphertext =
      merged.address === undefined
        ? merged.record.addressCiphertext
        : this.deps.codec.encrypt(merged.address);
    return { ...merged.record, addressCiphertext, version };
  }

  private stateOf(record: PropertyRecord, merged: MergeResult): PropertyState {
    const address: StoredAddress =
      merged.address === undefined
        ? readAddress(this.deps.codec, record, this.deps.logger)
        : { readable: true, value: merged.address };
    return toPropertyState(record, address);
  }

  // Publishing happens after commit and never undoes it
  private async announce(
    result: ReconcileResult,
    previous: PropertyRecord | null,
    source: string
  ): Promise<void> {
    const { events, logger } = this.deps;
    if (!events) return;

    const { state, outcome } = result;
    const change: ReconcileOutcome["change"] = outcome.change;
    if (change === "noop") return;

    const evt: PropertyChangedEvt = {
      type: "property_changed",
      id: this.newId(),
      data: {
        propertyId: state.id,
        listingId: state.listingId,
        version: state.version,
        change,
        source,
        appliedFields: outcome.appliedFields,
        status: state.status,
        previousStatus: previous ? previous.status : null,
      },
    };

    try {
      await events.publish(evt);
    } catch (error) {
      this.health.eventsFailed++;
      logger.error(`Failed to publish property_changed for ${state.id}:`, error);
    }
  }
}
