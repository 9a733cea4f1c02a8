import { z } from "zod";
import {
  CONFLICT_RESOLUTIONS,
  ConflictResolution,
  ConflictResolutionRequest,
  PageOptions,
  PropertyUpdateRequest,
} from "./dto";
import { ValidationError } from "./errors";
import { trustFieldSchema } from "./trust";

const text = z.string().trim().min(1);

const MAX_INT4 = 2_147_483_647;

// Sources send null for "I have nothing"; treat it the same as absent
function dropNulls(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).filter(([, field]) => field !== null)
  );
}

export const updateRequestSchema = z
  .object({
    source: text.max(64),
    listingId: text.max(128).optional(),
    propertyId: text.max(128).optional(),
    observedAt: z.string().datetime({ offset: true }).optional(),

    address: text.max(512).optional(),
    city: text.max(128).optional(),
    state: text.max(64).optional(),
    postalCode: text.max(16).optional(),
    // Ranges and scales match the SQL columns, so a value reads back as written
    bedrooms: z.number().int().min(0).max(100).optional(),
    bathrooms: z.number().min(0).max(100).multipleOf(0.01).optional(),
    squareFeet: z.number().int().positive().max(MAX_INT4).optional(),
    propertyType: text.max(64).optional(),
    price: z.number().min(0).lt(1e12).multipleOf(0.01).optional(),
    description: z.string().max(20000).optional(),
    agentName: text.max(256).optional(),
    officeName: text.max(256).optional(),
    sourceUrl: z.string().url().optional(),
    isBookable: z.boolean().optional(),

    media: z.array(z.string().url()).max(500).optional(),
    clearMedia: z.boolean().optional(),
    status: text.max(64).optional(),
    internalNotes: z.string().max(20000).optional(),
  })
  .refine((req) => req.listingId !== undefined || req.propertyId !== undefined, {
    message: "listingId or propertyId is required",
    path: ["listingId"],
  });

// Resolution names the upstream feeds use for themselves
const RESOLUTION_ALIASES: Record<string, ConflictResolution> = {
  har_authoritative: "listing_authoritative",
  fub_authoritative: "crm_authoritative",
};

const conflictResolutionSchema = z.object({
  propertyId: text.max(128),
  field: trustFieldSchema,
  resolution: z.preprocess(
    (value) =>
      typeof value === "string"
        ? RESOLUTION_ALIASES[value.trim().toLowerCase()] ?? value.trim().toLowerCase()
        : value,
    z.enum(CONFLICT_RESOLUTIONS)
  ),
});

const pageSchema = z.object({
  limit: z.number().int().min(1).max(1000).optional(),
  offset: z.number().int().min(0).optional(),
});

function toValidationError(message: string, error: z.ZodError): ValidationError {
  return new ValidationError(message, {
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

/**
 * Validate and normalise an inbound update. Strings are trimmed and
 * null fields dropped; unknown keys are ignored.
 */
export function parseUpdateRequest(input: unknown): PropertyUpdateRequest {
  const result = z.preprocess(dropNulls, updateRequestSchema).safeParse(input);
  if (!result.success) {
    throw toValidationError("Invalid property update", result.error);
  }
  return result.data;
}

export function parseConflictResolution(input: unknown): ConflictResolutionRequest {
  const result = conflictResolutionSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError("Invalid conflict resolution", result.error);
  }
  return result.data;
}

export function parsePage(input: PageOptions = {}): Required<PageOptions> {
  const result = pageSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError("Invalid page options", result.error);
  }
  return {
    limit: result.data.limit ?? 100,
    offset: result.data.offset ?? 0,
  };
}
