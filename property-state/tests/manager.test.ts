import { silentLogger } from "@estate-core/shared-utils";
import type { Logger } from "@estate-core/shared-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryPropertyStore } from "../src/adapters/store.memory";
import { AesGcmCodec } from "../src/core/codec";
import { ValidationError } from "../src/core/errors";
import { PropertyStateManager } from "../src/core/manager";
import { makeRecord, T0, TEST_KEY } from "./fixtures";

const ENGINE = { maxRetries: 3, retryBackoffMs: 0, timeoutMs: 5000, statsCacheTtlSec: 0 };

function at(minutes: number): string {
  return new Date(Date.parse(T0) + minutes * 60_000).toISOString();
}

describe("PropertyStateManager reads", () => {
  let store: MemoryPropertyStore;
  let codec: AesGcmCodec;
  let manager: PropertyStateManager;

  beforeEach(() => {
    store = new MemoryPropertyStore();
    codec = new AesGcmCodec(TEST_KEY);
    manager = new PropertyStateManager(
      { store, codec, logger: silentLogger, now: () => new Date(T0) },
      ENGINE
    );

    store.put(makeRecord({ id: "a", listingId: "L-a", status: "active", createdAt: at(1) }));
    store.put(makeRecord({ id: "b", listingId: "L-b", status: "available", createdAt: at(2) }));
    store.put(makeRecord({ id: "c", listingId: "L-c", status: "pending", createdAt: at(3) }));
    store.put(makeRecord({ id: "d", listingId: "L-d", status: "sold", createdAt: at(4) }));
    store.put(
      makeRecord({ id: "e", listingId: "L-e", status: "pending_images", createdAt: at(5) })
    );
  });

  it("should treat active and available as one group", async () => {
    const active = await manager.listByStatus("active");
    const available = await manager.listByStatus("available");

    expect(active.map((state) => state.id)).toEqual(["a", "b"]);
    expect(available.map((state) => state.id)).toEqual(["a", "b"]);
  });

  it("should list other statuses on their own", async () => {
    const sold = await manager.listByStatus("sold");

    expect(sold.map((state) => state.id)).toEqual(["d"]);
  });

  it("should list only publicly visible properties", async () => {
    const visible = await manager.listPublic();

    expect(visible.map((state) => state.id)).toEqual(["a", "b", "c"]);
  });

  it("should list every property when no filter is given", async () => {
    const all = await manager.list();

    expect(all.map((state) => state.id)).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("should apply a filter and page to the full listing", async () => {
    const page = await manager.list({ statuses: ["active", "sold"] }, { limit: 1, offset: 1 });

    expect(page.map((state) => state.id)).toEqual(["d"]);
  });

  it("should page through results in creation order", async () => {
    const page = await manager.listPublic({ limit: 1, offset: 1 });

    expect(page.map((state) => state.id)).toEqual(["b"]);
  });

  it("should reject a bad page", async () => {
    await expect(manager.listPublic({ limit: 0 })).rejects.toThrow(ValidationError);
  });

  it("should decrypt the address and hide the ciphertext", async () => {
    store.put(
      makeRecord({ id: "f", listingId: "L-f", addressCiphertext: codec.encrypt("9 Elm St") })
    );

    const state = await manager.getByListingId("L-f");

    expect(state?.address).toBe("9 Elm St");
    expect(state?.addressAvailable).toBe(true);
    expect(state !== null && "addressCiphertext" in state).toBe(false);
  });

  it("should return null for an unknown property", async () => {
    expect(await manager.getByIdentity("missing")).toBeNull();
    expect(await manager.getByListingId("missing")).toBeNull();
  });

  it("should serve an unreadable address as unavailable", async () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const reader = new PropertyStateManager({ store, codec, logger }, ENGINE);
    const otherKey = new AesGcmCodec(Buffer.alloc(32, 9));
    store.put(
      makeRecord({ id: "g", listingId: "L-g", addressCiphertext: otherKey.encrypt("1 Oak Ave") })
    );

    const state = await reader.getByIdentity("g");

    expect(state?.address).toBeNull();
    expect(state?.addressAvailable).toBe(false);
    expect(warn).toHaveBeenCalledWith("Stored address of property g is unreadable", {
      reason: "no configured key authenticates the ciphertext",
    });
  });

  it("should expose the transition log of a reconciled property", async () => {
    const { state } = await manager.reconcile({
      source: "scraper",
      listingId: "L-new",
      address: "5 Pine Rd",
      status: "active",
    });

    const log = await manager.getTransitionLog(state.id);

    expect(log.map((entry) => [entry.from, entry.to])).toEqual([
      [null, "pending_images"],
      ["pending_images", "active"],
    ]);
    expect(log.map((entry) => entry.sequence)).toEqual([1, 2]);
  });

  it("should move a listing's status through updateStatus", async () => {
    const { state } = await manager.updateStatus("L-c", "sold", "crm");

    expect(state.status).toBe("sold");
    expect(manager.isHealthy()).toBe(true);
  });

  it("should count and summarise through the stats aggregator", async () => {
    store.put(makeRecord({ id: "h", listingId: "L-h", status: "active", price: 100 }));

    expect(await manager.countMatching({ statuses: ["active"] })).toBe(2);

    const stats = await manager.getStats();
    expect(stats.total).toBe(6);
    expect(stats.active).toBe(3);
    expect(stats.averageActivePrice).toBe(100);
    expect(stats.generatedAt).toBe(T0);
    expect(stats.syncHealth.status).toBe("operational");
  });
});

describe("PropertyStateManager cached stats", () => {
  let store: MemoryPropertyStore;
  let manager: PropertyStateManager;

  beforeEach(() => {
    store = new MemoryPropertyStore();
    manager = new PropertyStateManager(
      { store, codec: new AesGcmCodec(TEST_KEY), logger: silentLogger, now: () => new Date(T0) },
      { ...ENGINE, statsCacheTtlSec: 60 }
    );
  });

  it("should refresh cached stats after a committed write", async () => {
    expect((await manager.getStats()).total).toBe(0);
    expect(await manager.countMatching({})).toBe(0);

    await manager.reconcile({ source: "scraper", listingId: "L-1", address: "1 Elm St" });

    expect((await manager.getStats()).total).toBe(1);
    expect(await manager.countMatching({})).toBe(1);
  });

  it("should keep the cache through a no-op update", async () => {
    await manager.reconcile({ source: "scraper", listingId: "L-1", address: "1 Elm St" });
    expect((await manager.getStats()).total).toBe(1);
    store.put(makeRecord({ id: "side", listingId: "L-side" }));

    const { outcome } = await manager.reconcile({
      source: "scraper",
      listingId: "L-1",
      address: "1 Elm St",
    });

    expect(outcome.change).toBe("noop");
    expect((await manager.getStats()).total).toBe(1);
  });

  it("should refresh cached stats after a status change or a resolution", async () => {
    const { state } = await manager.reconcile({
      source: "scraper",
      listingId: "L-1",
      address: "1 Elm St",
    });
    expect((await manager.getStats()).byStatus.pending_images).toBe(1);

    await manager.updateStatus("L-1", "active", "scraper");
    expect((await manager.getStats()).active).toBe(1);

    store.put(makeRecord({ id: "side", listingId: "L-side", status: "sold" }));
    await manager.resolveConflict(state.id, "price", "manual_override");
    expect((await manager.getStats()).terminal).toBe(1);
  });
});
