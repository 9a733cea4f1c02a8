import { Logger } from "@estate-core/shared-utils";
import {
  ConflictResolutionResult,
  PageOptions,
  PropertyFilter,
  PropertyState,
  PropertyStats,
  PropertyStatus,
  PropertyUpdateRequest,
  ReconcileOptions,
  ReconcileResult,
  StatusTransition,
} from "./dto";
import { FieldCodec } from "./codec";
import { PropertyEventsPort, PropertyStorePort } from "./ports";
import { PropertyReader } from "./reader";
import { Reconciler, ReconcilerConfig } from "./reconcile";
import { StatsAggregator } from "./stats";
import { StatusRules } from "./status";
import { TrustPolicy } from "./trust";

export interface PropertyStateConfig extends ReconcilerConfig {
  statsCacheTtlSec: number;
}

export interface PropertyStateDeps {
  store: PropertyStorePort;
  codec: FieldCodec;
  logger: Logger;
  policy?: TrustPolicy;
  statusRules?: StatusRules;
  events?: PropertyEventsPort;
  now?: () => Date;
}

/**
 * The single handle collaborators get. Writes go through the engine;
 * nothing outside this class sees the store.
 */
export class PropertyStateManager {
  private reconciler: Reconciler;
  private reader: PropertyReader;
  private stats: StatsAggregator;

  constructor(deps: PropertyStateDeps, config: PropertyStateConfig) {
    const logger = deps.logger;

    this.reconciler = new Reconciler(
      {
        store: deps.store,
        codec: deps.codec,
        policy: deps.policy ?? new TrustPolicy(),
        statusRules: deps.statusRules ?? new StatusRules(),
        logger,
        events: deps.events,
        now: deps.now,
      },
      config
    );
    this.reader = new PropertyReader(deps.store, deps.codec, logger);
    this.stats = new StatsAggregator(
      deps.store,
      () => this.reconciler.getHealth(),
      { cacheTtlSec: config.statsCacheTtlSec },
      deps.now
    );
  }

  async reconcile(
    request: PropertyUpdateRequest,
    options?: ReconcileOptions
  ): Promise<ReconcileResult> {
    return this.written(await this.reconciler.reconcile(request, options));
  }

  async updateStatus(
    listingId: string,
    status: string,
    source: string,
    options?: ReconcileOptions
  ): Promise<ReconcileResult> {
    return this.written(
      await this.reconciler.updateStatus(listingId, status, source, options)
    );
  }

  async resolveConflict(
    propertyId: string,
    field: string,
    resolution: string,
    options?: ReconcileOptions
  ): Promise<ConflictResolutionResult> {
    const result = await this.reconciler.resolveConflict(
      propertyId,
      field,
      resolution,
      options
    );
    this.stats.invalidate();
    return result;
  }

  getByIdentity(propertyId: string): Promise<PropertyState | null> {
    return this.reader.getByIdentity(propertyId);
  }

  getByListingId(listingId: string): Promise<PropertyState | null> {
    return this.reader.getByListingId(listingId);
  }

  listByStatus(status: PropertyStatus, page?: PageOptions): Promise<PropertyState[]> {
    return this.reader.listByStatus(status, page);
  }

  listPublic(page?: PageOptions): Promise<PropertyState[]> {
    return this.reader.listPublic(page);
  }

  list(filter: PropertyFilter = {}, page?: PageOptions): Promise<PropertyState[]> {
    return this.reader.list(filter, page);
  }

  getTransitionLog(propertyId: string): Promise<StatusTransition[]> {
    return this.reader.getTransitionLog(propertyId);
  }

  getStats(): Promise<PropertyStats> {
    return this.stats.getStats();
  }

  countMatching(filter: PropertyFilter): Promise<number> {
    return this.stats.countMatching(filter);
  }

  isHealthy(): boolean {
    return this.reconciler.getHealth().status === "operational";
  }

  // Cached stats go stale as soon as a write lands
  private written(result: ReconcileResult): ReconcileResult {
    if (result.outcome.change !== "noop") {
      this.stats.invalidate();
    }
    return result;
  }
}
