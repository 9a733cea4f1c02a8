import { MemoryCache } from "@estate-core/shared-utils";
import {
  PROPERTY_STATUSES,
  PropertyFilter,
  PropertyStats,
  SyncHealth,
} from "./dto";
import { PropertyAggregatePort } from "./ports";
import { isPublic, isTerminal } from "./status";

export interface StatsConfig {
  /** 0 disables caching */
  cacheTtlSec: number;
}

const STATS_KEY = "stats";

function filterKey(filter: PropertyFilter): string {
  return JSON.stringify({
    statuses: filter.statuses ? [...filter.statuses].sort() : null,
    city: filter.city ?? null,
    propertyType: filter.propertyType ?? null,
  });
}

/**
 * Dashboard counts over the store. Results may lag writes by up to the
 * cache TTL.
 */
export class StatsAggregator {
  constructor(
    private store: PropertyAggregatePort,
    private health: () => SyncHealth,
    private config: StatsConfig,
    private now: () => Date = () => new Date(),
    private statsCache = new MemoryCache<PropertyStats>(),
    private countCache = new MemoryCache<number>()
  ) {}

  async getStats(): Promise<PropertyStats> {
    if (this.config.cacheTtlSec <= 0) return this.compute();
    return this.statsCache.wrap(STATS_KEY, this.config.cacheTtlSec, () =>
      this.compute()
    );
  }

  async countMatching(filter: PropertyFilter): Promise<number> {
    if (this.config.cacheTtlSec <= 0) return this.store.countBy(filter);
    return this.countCache.wrap(filterKey(filter), this.config.cacheTtlSec, () =>
      this.store.countBy(filter)
    );
  }

  invalidate(): void {
    this.statsCache.clear();
    this.countCache.clear();
  }

  private async compute(): Promise<PropertyStats> {
    const [byStatus, averageActivePrice] = await Promise.all([
      this.store.countByStatus(),
      this.store.averagePrice({ statuses: ["active", "available"] }),
    ]);

    let total = 0;
    let terminal = 0;
    let publicListings = 0;
    for (const status of PROPERTY_STATUSES) {
      const count = byStatus[status];
      total += count;
      if (isTerminal(status)) terminal += count;
      if (isPublic(status)) publicListings += count;
    }

    return {
      total,
      byStatus,
      active: byStatus.active + byStatus.available,
      pending: byStatus.pending,
      terminal,
      publicListings,
      averageActivePrice,
      generatedAt: this.now().toISOString(),
      syncHealth: this.health(),
    };
  }
}
