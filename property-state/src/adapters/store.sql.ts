import { QueryResultRow } from "pg";
import { z } from "zod";
import {
  NewStatusTransition,
  PageOptions,
  PROPERTY_STATUSES,
  PropertyFilter,
  PropertyRecord,
  PropertyStatus,
  SOURCE_KINDS,
  StatusTransition,
} from "../core/dto";
import {
  isPropertyStateError,
  StoreUnavailableError,
  ValidationError,
} from "../core/errors";
import {
  ConditionalUpdateResult,
  CreateResult,
  PropertyStorePort,
} from "../core/ports";
import { emptyStatusCounts } from "../core/status";
import { trustFieldSchema } from "../core/trust";

// The slice of pg's Pool this store needs
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{
    rows: QueryResultRow[];
    rowCount: number | null;
  }>;
  release(): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
}

const UNIQUE_VIOLATION = "23505";
const CONNECTION_ERRORS = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
];

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isConnectionError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) return false;
  return CONNECTION_ERRORS.includes(code) || code.startsWith("08");
}

const timestamp = z
  .union([z.date(), z.string()])
  .transform((value) => new Date(value).toISOString());

// pg hands NUMERIC back as a string
const numeric = z.union([z.number(), z.string()]).transform(Number);

const provenanceSchema = z.record(
  trustFieldSchema,
  z.object({
    source: z.enum(SOURCE_KINDS),
    sourceName: z.string(),
    at: z.string(),
  })
);

const propertyRowSchema = z.object({
  id: z.string(),
  listing_id: z.string().nullable(),
  address_ciphertext: z.string().nullable(),
  city: z.string().nullable(),
  state: z.string().nullable(),
  postal_code: z.string().nullable(),
  bedrooms: z.number().nullable(),
  bathrooms: numeric.nullable(),
  square_feet: z.number().nullable(),
  property_type: z.string().nullable(),
  price: numeric.nullable(),
  description: z.string().nullable(),
  agent_name: z.string().nullable(),
  office_name: z.string().nullable(),
  source_url: z.string().nullable(),
  is_bookable: z.boolean().nullable(),
  media: z.array(z.string()),
  internal_notes: z.string().nullable(),
  status: z.enum(PROPERTY_STATUSES),
  status_updated_at: timestamp,
  provenance: provenanceSchema,
  version: z.number().int(),
  created_at: timestamp,
  updated_at: timestamp,
});

const transitionRowSchema = z.object({
  property_id: z.string(),
  sequence: z.number().int(),
  from_status: z.enum(PROPERTY_STATUSES).nullable(),
  to_status: z.enum(PROPERTY_STATUSES),
  source: z.enum(SOURCE_KINDS),
  source_name: z.string(),
  at: timestamp,
});

const COLUMNS = [
  "id",
  "listing_id",
  "address_ciphertext",
  "city",
  "state",
  "postal_code",
  "bedrooms",
  "bathrooms",
  "square_feet",
  "property_type",
  "price",
  "description",
  "agent_name",
  "office_name",
  "source_url",
  "is_bookable",
  "media",
  "internal_notes",
  "status",
  "status_updated_at",
  "provenance",
  "version",
  "created_at",
  "updated_at",
];

function recordValues(record: PropertyRecord): unknown[] {
  return [
    record.id,
    record.listingId,
    record.addressCiphertext,
    record.city,
    record.state,
    record.postalCode,
    record.bedrooms,
    record.bathrooms,
    record.squareFeet,
    record.propertyType,
    record.price,
    record.description,
    record.agentName,
    record.officeName,
    record.sourceUrl,
    record.isBookable,
    JSON.stringify(record.media),
    record.internalNotes,
    record.status,
    record.statusUpdatedAt,
    JSON.stringify(record.provenance),
    record.version,
    record.createdAt,
    record.updatedAt,
  ];
}

function buildWhere(
  filter: PropertyFilter,
  values: unknown[]
): string {
  const clauses: string[] = [];
  if (filter.statuses) {
    values.push([...filter.statuses]);
    clauses.push(`status = ANY($${values.length})`);
  }
  if (filter.city !== undefined) {
    values.push(filter.city);
    clauses.push(`LOWER(city) = LOWER($${values.length})`);
  }
  if (filter.propertyType !== undefined) {
    values.push(filter.propertyType);
    clauses.push(`LOWER(property_type) = LOWER($${values.length})`);
  }
  return clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
}

/**
 * PostgreSQL property store. Every write runs in one transaction with
 * the status log rows it produces.
 */
export class SqlPropertyStore implements PropertyStorePort {
  constructor(private pool: SqlPool) {}

  async getByIdentity(propertyId: string): Promise<PropertyRecord | null> {
    return this.withClient("getByIdentity", async (client) => {
      const result = await client.query(
        `SELECT ${COLUMNS.join(", ")} FROM properties WHERE id = $1`,
        [propertyId]
      );
      return result.rows.length > 0 ? this.rowToRecord(result.rows[0]) : null;
    });
  }

  async getByListingId(listingId: string): Promise<PropertyRecord | null> {
    return this.withClient("getByListingId", async (client) => {
      const result = await client.query(
        `SELECT ${COLUMNS.join(", ")} FROM properties WHERE listing_id = $1`,
        [listingId]
      );
      return result.rows.length > 0 ? this.rowToRecord(result.rows[0]) : null;
    });
  }

  async list(filter: PropertyFilter, page: PageOptions = {}): Promise<PropertyRecord[]> {
    return this.withClient("list", async (client) => {
      const values: unknown[] = [];
      const where = buildWhere(filter, values);
      values.push(page.limit ?? 100, page.offset ?? 0);

      const result = await client.query(
        `SELECT ${COLUMNS.join(", ")} FROM properties ${where}
         ORDER BY created_at, id
         LIMIT $${values.length - 1} OFFSET $${values.length}`,
        values
      );
      return result.rows.map((row) => this.rowToRecord(row));
    });
  }

  async create(
    record: PropertyRecord,
    transitions: NewStatusTransition[]
  ): Promise<CreateResult> {
    return this.withClient("create", async (client) => {
      await client.query("BEGIN");
      try {
        const placeholders = COLUMNS.map((_, i) => `$${i + 1}`).join(", ");
        const inserted = await client.query(
          `INSERT INTO properties (${COLUMNS.join(", ")})
           VALUES (${placeholders})
           ON CONFLICT (listing_id) DO NOTHING
           RETURNING id`,
          recordValues(record)
        );

        if ((inserted.rowCount ?? 0) === 0) {
          await client.query("ROLLBACK");
          return { created: false, reason: "duplicate_listing" };
        }

        await this.insertTransitions(client, record.id, 0, transitions);
        await client.query("COMMIT");
        return { created: true, id: record.id };
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    });
  }

  async conditionalUpdate(
    propertyId: string,
    expectedVersion: number,
    record: PropertyRecord,
    transitions: NewStatusTransition[]
  ): Promise<ConditionalUpdateResult> {
    return this.withClient("conditionalUpdate", async (client) => {
      await client.query("BEGIN");
      try {
        // Columns after id, numbered from $3
        const assignments = COLUMNS.slice(1)
          .map((column, i) => `${column} = $${i + 3}`)
          .join(", ");
        const updated = await client.query(
          `UPDATE properties SET ${assignments}
           WHERE id = $1 AND version = $2`,
          [propertyId, expectedVersion, ...recordValues(record).slice(1)]
        );

        if ((updated.rowCount ?? 0) === 0) {
          await client.query("ROLLBACK");
          return "conflict";
        }

        if (transitions.length > 0) {
          const last = await client.query(
            `SELECT COALESCE(MAX(sequence), 0) AS last FROM property_status_transitions
             WHERE property_id = $1`,
            [propertyId]
          );
          const lastSequence = z.coerce.number().parse(last.rows[0]?.last ?? 0);
          await this.insertTransitions(client, propertyId, lastSequence, transitions);
        }

        await client.query("COMMIT");
        return "success";
      } catch (error) {
        await client.query("ROLLBACK");
        if (errorCode(error) === UNIQUE_VIOLATION) {
          throw new ValidationError(
            `Listing ${record.listingId} is already bound to another property`,
            { listingId: record.listingId, propertyId }
          );
        }
        throw error;
      }
    });
  }

  async getTransitions(propertyId: string): Promise<StatusTransition[]> {
    return this.withClient("getTransitions", async (client) => {
      const result = await client.query(
        `SELECT property_id, sequence, from_status, to_status, source, source_name, at
         FROM property_status_transitions
         WHERE property_id = $1
         ORDER BY sequence`,
        [propertyId]
      );
      return result.rows.map((row) => {
        const parsed = transitionRowSchema.parse(row);
        return {
          propertyId: parsed.property_id,
          sequence: parsed.sequence,
          from: parsed.from_status,
          to: parsed.to_status,
          source: parsed.source,
          sourceName: parsed.source_name,
          at: parsed.at,
        };
      });
    });
  }

  async countBy(filter: PropertyFilter): Promise<number> {
    return this.withClient("countBy", async (client) => {
      const values: unknown[] = [];
      const where = buildWhere(filter, values);
      const result = await client.query(
        `SELECT COUNT(*)::int AS count FROM properties ${where}`,
        values
      );
      return z.coerce.number().parse(result.rows[0]?.count ?? 0);
    });
  }

  async countByStatus(): Promise<Record<PropertyStatus, number>> {
    return this.withClient("countByStatus", async (client) => {
      const result = await client.query(
        "SELECT status, COUNT(*)::int AS count FROM properties GROUP BY status"
      );
      const counts = emptyStatusCounts();
      const rowSchema = z.object({
        status: z.enum(PROPERTY_STATUSES),
        count: z.coerce.number(),
      });
      for (const row of result.rows) {
        const parsed = rowSchema.parse(row);
        counts[parsed.status] = parsed.count;
      }
      return counts;
    });
  }

  async averagePrice(filter: PropertyFilter): Promise<number | null> {
    return this.withClient("averagePrice", async (client) => {
      const values: unknown[] = [];
      const where = buildWhere(filter, values);
      const priced = where ? `${where} AND price IS NOT NULL` : "WHERE price IS NOT NULL";
      const result = await client.query(
        `SELECT AVG(price) AS average FROM properties ${priced}`,
        values
      );
      return numeric.nullable().parse(result.rows[0]?.average ?? null);
    });
  }

  private async insertTransitions(
    client: SqlClient,
    propertyId: string,
    lastSequence: number,
    transitions: NewStatusTransition[]
  ): Promise<void> {
    for (const [i, transition] of transitions.entries()) {
      await client.query(
        `INSERT INTO property_status_transitions
           (property_id, sequence, from_status, to_status, source, source_name, at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          propertyId,
          lastSequence + i + 1,
          transition.from,
          transition.to,
          transition.source,
          transition.sourceName,
          transition.at,
        ]
      );
    }
  }

  /**
   * Run `work` on a pooled client. Failures to reach the database become
   * StoreUnavailableError; domain errors pass through.
   */
  private async withClient<T>(
    operation: string,
    work: (client: SqlClient) => Promise<T>
  ): Promise<T> {
    let client: SqlClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }

    try {
      return await work(client);
    } catch (error) {
      if (!isPropertyStateError(error) && isConnectionError(error)) {
        throw new StoreUnavailableError(operation, error);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  private rowToRecord(row: QueryResultRow): PropertyRecord {
    const parsed = propertyRowSchema.parse(row);
    return {
      id: parsed.id,
      listingId: parsed.listing_id,
      addressCiphertext: parsed.address_ciphertext,
      city: parsed.city,
      state: parsed.state,
      postalCode: parsed.postal_code,
      bedrooms: parsed.bedrooms,
      bathrooms: parsed.bathrooms,
      squareFeet: parsed.square_feet,
      propertyType: parsed.property_type,
      price: parsed.price,
      description: parsed.description,
      agentName: parsed.agent_name,
      officeName: parsed.office_name,
      sourceUrl: parsed.source_url,
      isBookable: parsed.is_bookable,
      media: parsed.media,
      internalNotes: parsed.internal_notes,
      status: parsed.status,
      statusUpdatedAt: parsed.status_updated_at,
      provenance: parsed.provenance,
      version: parsed.version,
      createdAt: parsed.created_at,
      updatedAt: parsed.updated_at,
    };
  }
}
