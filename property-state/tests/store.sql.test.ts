import { silentLogger } from "@estate-core/shared-utils";
import type { QueryResultRow } from "pg";
import { describe, expect, it } from "vitest";
import { SqlClient, SqlPool, SqlPropertyStore } from "../src/adapters/store.sql";
import { AesGcmCodec } from "../src/core/codec";
import { StoreUnavailableError, ValidationError } from "../src/core/errors";
import { Reconciler } from "../src/core/reconcile";
import { StatusRules } from "../src/core/status";
import { TrustPolicy } from "../src/core/trust";
import { makeRecord, T0, TEST_KEY } from "./fixtures";

type Result = { rows: QueryResultRow[]; rowCount: number | null };
type Responder = (text: string, values: unknown[]) => Result;

const EMPTY: Result = { rows: [], rowCount: null };

class FakeClient implements SqlClient {
  queries: Array<{ text: string; values: unknown[] }> = [];
  released = 0;

  constructor(private respond: Responder) {}

  async query(text: string, values: unknown[] = []): Promise<Result> {
    this.queries.push({ text, values });
    return this.respond(text.trim(), values);
  }

  release(): void {
    this.released++;
  }

  statements(): string[] {
    return this.queries.map((query) => query.text.trim().split(/\s+/)[0]);
  }
}

function poolFor(client: FakeClient): SqlPool {
  return { connect: async () => client };
}

function propertyRow(overrides: QueryResultRow = {}): QueryResultRow {
  return {
    id: "prop-1",
    listing_id: "MLS123",
    address_ciphertext: null,
    city: "Austin",
    state: "TX",
    postal_code: null,
    bedrooms: 3,
    bathrooms: "2.5",
    square_feet: 1400,
    property_type: null,
    price: "300000.00",
    description: null,
    agent_name: null,
    office_name: null,
    source_url: null,
    is_bookable: true,
    media: ["https://img.test/a.jpg"],
    internal_notes: null,
    status: "active",
    status_updated_at: new Date(T0),
    provenance: { price: { source: "listing_sync", sourceName: "scraper", at: T0 } },
    version: 4,
    created_at: new Date(T0),
    updated_at: T0,
    ...overrides,
  };
}

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("SqlPropertyStore", () => {
  it("should map a row onto a record", async () => {
    const client = new FakeClient(() => ({ rows: [propertyRow()], rowCount: 1 }));
    const store = new SqlPropertyStore(poolFor(client));

    const record = await store.getByIdentity("prop-1");

    expect(record).toMatchObject({
      id: "prop-1",
      listingId: "MLS123",
      city: "Austin",
      bathrooms: 2.5,
      price: 300000,
      isBookable: true,
      media: ["https://img.test/a.jpg"],
      status: "active",
      statusUpdatedAt: T0,
      createdAt: T0,
      updatedAt: T0,
      version: 4,
    });
    expect(record?.provenance.price?.source).toBe("listing_sync");
    expect(client.queries[0].values).toEqual(["prop-1"]);
    expect(client.released).toBe(1);
  });

  it("should return null when nothing matches", async () => {
    const client = new FakeClient(() => EMPTY);
    const store = new SqlPropertyStore(poolFor(client));

    expect(await store.getByListingId("nope")).toBeNull();
    expect(client.queries[0].text).toContain("WHERE listing_id = $1");
  });

  it("should update with a version guard and log transitions in one transaction", async () => {
    const client = new FakeClient((text) => {
      if (text.startsWith("UPDATE")) return { rows: [], rowCount: 1 };
      if (text.startsWith("SELECT")) return { rows: [{ last: 2 }], rowCount: 1 };
      return EMPTY;
    });
    const store = new SqlPropertyStore(poolFor(client));

    const result = await store.conditionalUpdate("prop-1", 4, makeRecord({ version: 5 }), [
      { from: "active", to: "pending", source: "crm", sourceName: "fub", at: T0 },
    ]);

    expect(result).toBe("success");
    expect(client.statements()).toEqual(["BEGIN", "UPDATE", "SELECT", "INSERT", "COMMIT"]);

    const update = client.queries[1];
    expect(update.text).toContain("WHERE id = $1 AND version = $2");
    expect(update.values.slice(0, 3)).toEqual(["prop-1", 4, "MLS123"]);

    const insert = client.queries[3];
    expect(insert.values).toEqual(["prop-1", 3, "active", "pending", "crm", "fub", T0]);
    expect(client.released).toBe(1);
  });

  it("should report a conflict when the version moved", async () => {
    const client = new FakeClient((text) =>
      text.startsWith("UPDATE") ? { rows: [], rowCount: 0 } : EMPTY
    );
    const store = new SqlPropertyStore(poolFor(client));

    const result = await store.conditionalUpdate("prop-1", 4, makeRecord({ version: 5 }), [
      { from: "active", to: "pending", source: "crm", sourceName: "fub", at: T0 },
    ]);

    expect(result).toBe("conflict");
    expect(client.statements()).toEqual(["BEGIN", "UPDATE", "ROLLBACK"]);
  });

  it("should insert a new record with its initial transition", async () => {
    const client = new FakeClient((text) =>
      text.startsWith("INSERT INTO properties")
        ? { rows: [{ id: "prop-1" }], rowCount: 1 }
        : EMPTY
    );
    const store = new SqlPropertyStore(poolFor(client));

    const result = await store.create(makeRecord({ status: "pending_images" }), [
      { from: null, to: "pending_images", source: "listing_sync", sourceName: "scraper", at: T0 },
    ]);

    expect(result).toEqual({ created: true, id: "prop-1" });
    expect(client.statements()).toEqual(["BEGIN", "INSERT", "INSERT", "COMMIT"]);
    expect(client.queries[1].text).toContain("ON CONFLICT (listing_id) DO NOTHING");
    expect(client.queries[2].values.slice(0, 4)).toEqual(["prop-1", 1, null, "pending_images"]);
  });

  it("should report a duplicate listing on create", async () => {
    const client = new FakeClient((text) =>
      text.startsWith("INSERT") ? { rows: [], rowCount: 0 } : EMPTY
    );
    const store = new SqlPropertyStore(poolFor(client));

    const result = await store.create(makeRecord(), []);

    expect(result).toEqual({ created: false, reason: "duplicate_listing" });
    expect(client.statements()).toEqual(["BEGIN", "INSERT", "ROLLBACK"]);
  });

  it("should turn a unique violation on update into a validation error", async () => {
    const client = new FakeClient((text) => {
      if (text.startsWith("UPDATE")) {
        throw pgError("23505", "duplicate key value violates unique constraint");
      }
      return EMPTY;
    });
    const store = new SqlPropertyStore(poolFor(client));

    await expect(
      store.conditionalUpdate("prop-1", 1, makeRecord({ version: 2 }), [])
    ).rejects.toThrow(ValidationError);
    expect(client.statements()).toEqual(["BEGIN", "UPDATE", "ROLLBACK"]);
    expect(client.released).toBe(1);
  });

  it("should report an unreachable database as unavailable", async () => {
    const store = new SqlPropertyStore({
      connect: async () => {
        throw pgError("ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:5432");
      },
    });

    await expect(store.getByIdentity("prop-1")).rejects.toThrow(StoreUnavailableError);
  });

  it("should report a dropped connection as unavailable", async () => {
    const dropped = pgError("57P01", "terminating connection due to administrator command");
    const client = new FakeClient(() => {
      throw dropped;
    });
    const store = new SqlPropertyStore(poolFor(client));

    const failure = store.countBy({});

    await expect(failure).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(failure).rejects.toMatchObject({ cause: dropped });
  });

  it("should pass other database errors through", async () => {
    const syntax = pgError("42601", "syntax error");
    const client = new FakeClient(() => {
      throw syntax;
    });
    const store = new SqlPropertyStore(poolFor(client));

    await expect(store.countBy({})).rejects.toBe(syntax);
  });

  it("should build filters and paging as parameters", async () => {
    const client = new FakeClient(() => EMPTY);
    const store = new SqlPropertyStore(poolFor(client));

    await store.list({ statuses: ["active"], city: "Austin" }, { limit: 10, offset: 20 });

    const { text, values } = client.queries[0];
    expect(text).toContain("WHERE status = ANY($1) AND LOWER(city) = LOWER($2)");
    expect(text).toContain("LIMIT $3 OFFSET $4");
    expect(values).toEqual([["active"], "Austin", 10, 20]);
  });

  it("should fill status counts from a grouped query", async () => {
    const client = new FakeClient(() => ({
      rows: [
        { status: "active", count: 4 },
        { status: "sold", count: "2" },
      ],
      rowCount: 2,
    }));
    const store = new SqlPropertyStore(poolFor(client));

    expect(await store.countByStatus()).toEqual({
      pending_images: 0,
      active: 4,
      available: 0,
      pending: 0,
      sold: 2,
      withdrawn: 0,
      deleted: 0,
    });
  });

  it("should average priced records only", async () => {
    const client = new FakeClient(() => ({ rows: [{ average: "250.5000" }], rowCount: 1 }));
    const store = new SqlPropertyStore(poolFor(client));

    const average = await store.averagePrice({ statuses: ["active", "available"] });

    expect(average).toBe(250.5);
    expect(client.queries[0].text).toContain(
      "WHERE status = ANY($1) AND price IS NOT NULL"
    );
    expect(client.queries[0].values).toEqual([["active", "available"]]);
  });

  it("should return a null average for an empty set", async () => {
    const client = new FakeClient(() => ({ rows: [{ average: null }], rowCount: 1 }));
    const store = new SqlPropertyStore(poolFor(client));

    expect(await store.averagePrice({})).toBeNull();
    expect(client.queries[0].text).toContain("WHERE price IS NOT NULL");
  });

  it("should read the transition log in order", async () => {
    const client = new FakeClient(() => ({
      rows: [
        {
          property_id: "prop-1",
          sequence: 1,
          from_status: null,
          to_status: "pending_images",
          source: "listing_sync",
          source_name: "scraper",
          at: new Date(T0),
        },
      ],
      rowCount: 1,
    }));
    const store = new SqlPropertyStore(poolFor(client));

    expect(await store.getTransitions("prop-1")).toEqual([
      {
        propertyId: "prop-1",
        sequence: 1,
        from: null,
        to: "pending_images",
        source: "listing_sync",
        sourceName: "scraper",
        at: T0,
      },
    ]);
    expect(client.queries[0].text).toContain("ORDER BY sequence");
  });
});

const PROPERTY_COLUMNS = [
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

// pg hands NUMERIC(p, s) back as a string rounded to the column scale
const NUMERIC_SCALE: Record<string, number> = { bathrooms: 2, price: 2 };

function storedRow(values: unknown[]): QueryResultRow {
  const row: QueryResultRow = {};
  PROPERTY_COLUMNS.forEach((column, i) => {
    const value = values[i];
    const scale = NUMERIC_SCALE[column];
    if (scale !== undefined && typeof value === "number") {
      row[column] = value.toFixed(scale);
    } else if ((column === "media" || column === "provenance") && typeof value === "string") {
      row[column] = JSON.parse(value);
    } else {
      row[column] = value;
    }
  });
  return row;
}

/**
 * Holds a single properties row and answers the store's statements the
 * way Postgres would.
 */
function singleRowTable(): FakeClient {
  let row: QueryResultRow | null = null;

  return new FakeClient((text, values) => {
    if (text.startsWith("SELECT") && text.includes("FROM properties WHERE")) {
      return { rows: row ? [row] : [], rowCount: row ? 1 : 0 };
    }
    if (text.startsWith("INSERT INTO properties")) {
      if (row) return { rows: [], rowCount: 0 };
      row = storedRow(values);
      return { rows: [{ id: row.id }], rowCount: 1 };
    }
    if (text.startsWith("UPDATE")) {
      if (!row || row.version !== values[1]) return { rows: [], rowCount: 0 };
      row = storedRow([values[0], ...values.slice(2)]);
      return { rows: [], rowCount: 1 };
    }
    if (text.startsWith("SELECT COALESCE")) {
      return { rows: [{ last: 1 }], rowCount: 1 };
    }
    return { rows: [], rowCount: 1 };
  });
}

describe("SqlPropertyStore under the reconciler", () => {
  it("should treat a repeated update as a no-op after the database round trip", async () => {
    const client = singleRowTable();
    const reconciler = new Reconciler(
      {
        store: new SqlPropertyStore(poolFor(client)),
        codec: new AesGcmCodec(TEST_KEY),
        policy: new TrustPolicy(),
        statusRules: new StatusRules(),
        logger: silentLogger,
        now: () => new Date(T0),
      },
      { maxRetries: 3, retryBackoffMs: 0, timeoutMs: 5000 }
    );
    const request = {
      source: "scraper",
      listingId: "MLS123",
      address: "123 Main St",
      bathrooms: 2.25,
      price: 300000.5,
    };

    const first = await reconciler.reconcile(request);
    const second = await reconciler.reconcile(request);

    expect(first.outcome.change).toBe("create");
    expect(second.outcome.change).toBe("noop");
    expect(second.outcome.unchangedFields).toEqual(["address", "bathrooms", "price"]);
    expect(second.state).toMatchObject({ version: 1, bathrooms: 2.25, price: 300000.5 });
    expect(client.statements().filter((statement) => statement === "UPDATE")).toEqual([]);
  });
});
