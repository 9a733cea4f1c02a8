import { z } from "zod";
import {
  ATTRIBUTE_FIELDS,
  FieldProvenance,
  SOURCE_KINDS,
  SourceKind,
  TrustField,
} from "./dto";
import { ValidationError } from "./errors";

/**
 * How competing writes to a field are settled:
 * - ranked: higher rank wins, equal ranks fall back to recency
 * - union: values are appended by anyone; clearing is ranked
 * - exempt: no provenance; any source with a positive rank overwrites
 */
export type MergeMode = "ranked" | "union" | "exempt";

export const TRUST_FIELDS: readonly TrustField[] = [
  ...ATTRIBUTE_FIELDS,
  "address",
  "media",
  "status",
  "internalNotes",
];

export interface FieldRule {
  mode: MergeMode;
  ranks: Record<SourceKind, number>;
}

export interface TrustPolicyConfig {
  rules: Record<TrustField, FieldRule>;
  sourceAliases: Record<string, SourceKind>;
}

export interface WriteClaim {
  source: SourceKind;
  at: string;
}

const MARKET: FieldRule = {
  mode: "ranked",
  ranks: { listing_sync: 40, admin: 30, crm: 20, booking: 10, unknown: 0 },
};

const CONTACT: FieldRule = {
  mode: "ranked",
  ranks: { admin: 40, listing_sync: 30, crm: 20, booking: 10, unknown: 0 },
};

const MEDIA: FieldRule = { ...MARKET, mode: "union" };

const INTERNAL: FieldRule = {
  mode: "exempt",
  ranks: { admin: 40, listing_sync: 0, crm: 0, booking: 0, unknown: 0 },
};

export const DEFAULT_SOURCE_ALIASES: Record<string, SourceKind> = {
  listing_sync: "listing_sync",
  scraper: "listing_sync",
  har: "listing_sync",
  mls: "listing_sync",
  admin: "admin",
  manual: "admin",
  propertyhub: "admin",
  crm: "crm",
  fub: "crm",
  booking: "booking",
};

export const DEFAULT_TRUST_POLICY: TrustPolicyConfig = {
  rules: {
    price: MARKET,
    isBookable: MARKET,
    status: MARKET,
    agentName: CONTACT,
    officeName: CONTACT,
    sourceUrl: CONTACT,
    address: MARKET,
    city: MARKET,
    state: MARKET,
    postalCode: MARKET,
    bedrooms: MARKET,
    bathrooms: MARKET,
    squareFeet: MARKET,
    propertyType: MARKET,
    description: MARKET,
    media: MEDIA,
    internalNotes: INTERNAL,
  },
  sourceAliases: DEFAULT_SOURCE_ALIASES,
};

/**
 * Per-field source authority. Pure given its table.
 */
export class TrustPolicy {
  constructor(private config: TrustPolicyConfig = DEFAULT_TRUST_POLICY) {}

  resolveSource(raw: string): SourceKind {
    const key = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
    return this.config.sourceAliases[key] ?? "unknown";
  }

  authority(field: TrustField, source: SourceKind): number {
    return this.config.rules[field].ranks[source];
  }

  modeOf(field: TrustField): MergeMode {
    return this.config.rules[field].mode;
  }

  /**
   * Whether an incoming write may replace what `stored` records.
   * A field without provenance is open to anyone.
   */
  wins(field: TrustField, incoming: WriteClaim, stored?: FieldProvenance): boolean {
    if (!stored) return true;

    const incomingRank = this.authority(field, incoming.source);
    const storedRank = this.authority(field, stored.source);

    if (incomingRank !== storedRank) {
      return incomingRank > storedRank;
    }
    return Date.parse(incoming.at) >= Date.parse(stored.at);
  }
}

const ranksSchema = z.object({
  listing_sync: z.number().int(),
  admin: z.number().int(),
  crm: z.number().int(),
  booking: z.number().int(),
  unknown: z.number().int(),
});

const ruleSchema = z
  .object({
    mode: z.enum(["ranked", "union", "exempt"]),
    ranks: ranksSchema,
  })
  .refine(
    (rule) =>
      SOURCE_KINDS.every((kind) => rule.ranks.unknown <= rule.ranks[kind]),
    { message: "unknown sources must hold the lowest rank" }
  );

export const trustFieldSchema = z.enum([
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
  "address",
  "media",
  "status",
  "internalNotes",
]);

const policyFileSchema = z.object({
  groups: z.record(z.string(), ruleSchema).default({}),
  fields: z.record(trustFieldSchema, z.string()).default({}),
  sourceAliases: z.record(z.string(), z.enum(SOURCE_KINDS)).default({}),
});

/**
 * Parse a policy document of the form
 * `{ groups: { name: rule }, fields: { field: groupName }, sourceAliases }`
 * and lay it over the defaults. Fields it does not mention keep their
 * default rule.
 */
export function parseTrustPolicy(
  input: unknown,
  base: TrustPolicyConfig = DEFAULT_TRUST_POLICY
): TrustPolicyConfig {
  const parsed = policyFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid trust policy", {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }

  const { groups, fields, sourceAliases } = parsed.data;
  const rules = { ...base.rules };

  for (const field of TRUST_FIELDS) {
    const groupName = fields[field];
    if (groupName === undefined) continue;

    const rule = groups[groupName];
    if (!rule) {
      throw new ValidationError(`Field ${field} names unknown group ${groupName}`, {
        field,
        group: groupName,
      });
    }
    rules[field] = rule;
  }

  return {
    rules,
    sourceAliases: { ...base.sourceAliases, ...sourceAliases },
  };
}
