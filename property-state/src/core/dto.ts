export type ISO = string;
export type Money = number;

export const PROPERTY_STATUSES = [
  "pending_images",
  "active",
  "available",
  "pending",
  "sold",
  "withdrawn",
  "deleted",
] as const;
export type PropertyStatus = (typeof PROPERTY_STATUSES)[number];

export const SOURCE_KINDS = [
  "listing_sync",
  "admin",
  "crm",
  "booking",
  "unknown",
] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

// Every attribute is nullable: null means "unknown", never zero
export interface PropertyAttributes {
  city: string | null;
  state: string | null;
  postalCode: string | null;
  bedrooms: number | null;
  bathrooms: number | null;
  squareFeet: number | null;
  propertyType: string | null;
  price: Money | null;
  description: string | null;
  agentName: string | null;
  officeName: string | null;
  sourceUrl: string | null;
  isBookable: boolean | null;
}

export type AttributeField = keyof PropertyAttributes;

export const ATTRIBUTE_FIELDS: readonly AttributeField[] = [
  "city",
  "state",
  "postalCode",
  "bedrooms",
  "bathrooms",
  "squareFeet",
  "propertyType",
  "price",
  "description",
  "agentName",
  "officeName",
  "sourceUrl",
  "isBookable",
];

/** Fields whose writes are ranked and whose last writer is recorded */
export type RankedField = AttributeField | "address" | "media" | "status";

/** Fields governed by the trust policy */
export type TrustField = RankedField | "internalNotes";

/** Everything an update can touch */
export type UpdatableField = TrustField | "listingId";

export interface FieldProvenance {
  source: SourceKind;
  sourceName: string; // raw identifier the caller sent
  at: ISO;
}

export type Provenance = Partial<Record<TrustField, FieldProvenance>>;

/**
 * Canonical property as stored. The address only exists as ciphertext.
 */
export interface PropertyRecord extends PropertyAttributes {
  id: string;
  listingId: string | null;
  addressCiphertext: string | null;
  media: string[];
  internalNotes: string | null;
  status: PropertyStatus;
  statusUpdatedAt: ISO;
  provenance: Provenance;
  version: number;
  createdAt: ISO;
  updatedAt: ISO;
}

/**
 * Canonical property as handed to readers, with the address decrypted.
 * `addressAvailable` is false when the stored ciphertext could not be read.
 */
export interface PropertyState extends Omit<PropertyRecord, "addressCiphertext"> {
  address: string | null;
  addressAvailable: boolean;
}

export interface StatusTransition {
  propertyId: string;
  sequence: number;
  from: PropertyStatus | null;
  to: PropertyStatus;
  source: SourceKind;
  sourceName: string;
  at: ISO;
}

export type NewStatusTransition = Omit<StatusTransition, "propertyId" | "sequence">;

export type RequestAttributes = {
  [K in AttributeField]?: NonNullable<PropertyAttributes[K]>;
};

/**
 * Sparse inbound change. Absent fields are left untouched.
 */
export interface PropertyUpdateRequest extends RequestAttributes {
  source: string;
  listingId?: string;
  propertyId?: string;
  /** When the source observed these values; defaults to now */
  observedAt?: ISO;
  address?: string;
  media?: string[];
  clearMedia?: boolean;
  status?: string;
  internalNotes?: string;
}

export interface FieldRejection {
  field: UpdatableField;
  reason: "trust_rejected";
  heldBy: SourceKind | null;
}

export interface StatusRejection {
  reason: "illegal_transition" | "trust_rejected" | "unknown_status";
  from: PropertyStatus;
  requested: string;
}

export type ReconcileWarning = "address_unreadable";

export interface ReconcileOutcome {
  change: "create" | "update" | "noop";
  appliedFields: UpdatableField[];
  unchangedFields: UpdatableField[];
  rejectedFields: FieldRejection[];
  /** null when the request carried no status */
  statusAccepted: boolean | null;
  statusChanged: boolean;
  statusRejection: StatusRejection | null;
  retries: number;
  warnings: ReconcileWarning[];
}

export interface ReconcileResult {
  state: PropertyState;
  outcome: ReconcileOutcome;
}

export interface ReconcileOptions {
  /** Overrides the configured default deadline */
  timeoutMs?: number;
}

export const CONFLICT_RESOLUTIONS = [
  "manual_override",
  "listing_authoritative",
  "crm_authoritative",
] as const;
export type ConflictResolution = (typeof CONFLICT_RESOLUTIONS)[number];

export interface ConflictResolutionRequest {
  propertyId: string;
  field: TrustField;
  resolution: ConflictResolution;
}

export interface ConflictResolutionResult {
  state: PropertyState;
  field: TrustField;
  resolution: ConflictResolution;
  /** Provenance now stamped on the field */
  holder: FieldProvenance;
  previousHolder: FieldProvenance | null;
  retries: number;
}

export interface PropertyFilter {
  statuses?: readonly PropertyStatus[];
  city?: string;
  propertyType?: string;
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface SyncHealth {
  status: "operational" | "degraded";
  reconciles: number;
  conflictsRetried: number;
  conflictsExhausted: number;
  eventsFailed: number;
}

export interface PropertyStats {
  total: number;
  byStatus: Record<PropertyStatus, number>;
  /** active plus its alias available */
  active: number;
  pending: number;
  terminal: number;
  publicListings: number;
  averageActivePrice: Money | null;
  generatedAt: ISO;
  syncHealth: SyncHealth;
}

/**
 * Change notification as the core emits it; the bus adapter stamps it
 */
export interface PropertyChangedEvt {
  type: "property_changed";
  id: string;
  data: {
    propertyId: string;
    listingId: string | null;
    version: number;
    change: "create" | "update";
    source: string;
    appliedFields: UpdatableField[];
    status: PropertyStatus;
    previousStatus: PropertyStatus | null;
  };
}
