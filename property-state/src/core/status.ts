import { PROPERTY_STATUSES, PropertyStatus, SourceKind } from "./dto";

export const TERMINAL_STATUSES: readonly PropertyStatus[] = [
  "sold",
  "withdrawn",
  "deleted",
];

/** Statuses a public listing page or a booking form may show */
export const PUBLIC_STATUSES: readonly PropertyStatus[] = [
  "active",
  "available",
  "pending",
];

export const INITIAL_STATUS: PropertyStatus = "pending_images";

const STATUS_ALIASES: Record<string, PropertyStatus> = {
  coming_soon: "pending_images",
  under_contract: "pending",
  contingent: "pending",
  off_market: "withdrawn",
  expired: "withdrawn",
  removed: "deleted",
};

export type TransitionTable = Record<PropertyStatus, readonly PropertyStatus[]>;

// Re-listing a terminal property creates a new identity, so terminal
// states have no way out.
export const DEFAULT_TRANSITIONS: TransitionTable = {
  pending_images: ["active", "available", "withdrawn", "deleted"],
  active: ["available", "pending", "sold", "withdrawn", "deleted"],
  available: ["active", "pending", "sold", "withdrawn", "deleted"],
  pending: ["active", "available", "sold", "withdrawn", "deleted"],
  sold: [],
  withdrawn: [],
  deleted: [],
};

// The happy path: listing goes live, goes under contract, sells
const FORWARD_MOVES: TransitionTable = {
  pending_images: ["active", "available"],
  active: ["pending"],
  available: ["pending"],
  pending: ["sold"],
  sold: [],
  withdrawn: [],
  deleted: [],
};

export interface StatusRulesConfig {
  transitions: TransitionTable;
  /** Sources limited to happy-path forward moves */
  forwardOnlySources: readonly SourceKind[];
}

export const DEFAULT_STATUS_RULES: StatusRulesConfig = {
  transitions: DEFAULT_TRANSITIONS,
  forwardOnlySources: ["booking"],
};

export function isPropertyStatus(value: string): value is PropertyStatus {
  return PROPERTY_STATUSES.some((status) => status === value);
}

/**
 * Map whatever a source calls a status onto the canonical enumeration.
 * Returns null for values that mean nothing here.
 */
export function parseStatus(raw: string): PropertyStatus | null {
  const key = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (isPropertyStatus(key)) return key;
  return STATUS_ALIASES[key] ?? null;
}

/**
 * `available` reads as `active`; transition checks keep them apart.
 */
export function canonicalStatus(status: PropertyStatus): PropertyStatus {
  return status === "available" ? "active" : status;
}

export function isTerminal(status: PropertyStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isPublic(status: PropertyStatus): boolean {
  return PUBLIC_STATUSES.includes(status);
}

export function emptyStatusCounts(): Record<PropertyStatus, number> {
  return {
    pending_images: 0,
    active: 0,
    available: 0,
    pending: 0,
    sold: 0,
    withdrawn: 0,
    deleted: 0,
  };
}

export class StatusRules {
  constructor(private config: StatusRulesConfig = DEFAULT_STATUS_RULES) {}

  /**
   * Staying put is not a transition, so `isLegal(s, s)` is false.
   */
  isLegal(current: PropertyStatus, proposed: PropertyStatus): boolean {
    return this.config.transitions[current].includes(proposed);
  }

  isForward(current: PropertyStatus, proposed: PropertyStatus): boolean {
    return FORWARD_MOVES[current].includes(proposed);
  }

  /**
   * Legality for a particular source: forward-only sources may not
   * reverse, relabel, withdraw or delete.
   */
  isLegalFor(
    source: SourceKind,
    current: PropertyStatus,
    proposed: PropertyStatus
  ): boolean {
    if (!this.isLegal(current, proposed)) return false;
    if (this.config.forwardOnlySources.includes(source)) {
      return this.isForward(current, proposed);
    }
    return true;
  }

  legalTargets(current: PropertyStatus): readonly PropertyStatus[] {
    return this.config.transitions[current];
  }
}
