import { MemoryBus, ServiceState, silentLogger } from "@estate-core/shared-utils";
import type { BusEvent, Logger } from "@estate-core/shared-utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { AppConfig } from "../src/config/env";
import { AesGcmCodec } from "../src/core/codec";
import { DEFAULT_TRUST_POLICY } from "../src/core/trust";
import { PropertyStateService } from "../src/service-config";
import { T0 } from "./fixtures";

function testConfig(currentKey: string | null): AppConfig {
  return {
    mode: "dev",
    logLevel: "error",
    storeAdapter: "MEMORY",
    busType: "memory",
    db: { host: "localhost", port: 5432, user: "test", password: "test", name: "test" },
    redisUrl: "redis://localhost:6379",
    encryption: { currentKey, priorKeys: [] },
    engine: { maxRetries: 3, retryBackoffMs: 0, timeoutMs: 5000, statsCacheTtlSec: 0 },
    trustPolicy: DEFAULT_TRUST_POLICY,
  };
}

function publishedTypes(bus: MemoryBus): BusEvent["type"][] {
  return bus.getPublishedEvents().map((event) => event.type);
}

describe("PropertyStateService", () => {
  let service: PropertyStateService | undefined;

  afterEach(async () => {
    await service?.stop();
    service = undefined;
  });

  it("should refuse access to the engine before start", () => {
    service = new PropertyStateService(testConfig(AesGcmCodec.generateKey()), silentLogger);

    expect(() => service?.manager).toThrow("Service not started");
  });

  it("should reconcile updates that arrive on the bus", async () => {
    service = new PropertyStateService(testConfig(AesGcmCodec.generateKey()), silentLogger);
    await service.start();
    expect(service.lifecycle.getState()).toBe(ServiceState.RUNNING);

    const bus = service.getBus();
    expect(bus).toBeInstanceOf(MemoryBus);
    if (!(bus instanceof MemoryBus)) return;

    await bus.publish({
      type: "property_update_requested",
      id: "evt-1",
      timestamp: T0,
      data: { source: "scraper", listingId: "MLS77", address: "8 Hill Rd", price: 250000 },
    });

    const state = await service.manager.getByListingId("MLS77");
    expect(state?.address).toBe("8 Hill Rd");
    expect(state?.price).toBe(250000);
    expect(publishedTypes(bus)).toEqual(["property_update_requested", "property_changed"]);

    const changed = bus.getPublishedEvents()[1];
    expect(changed).toMatchObject({
      type: "property_changed",
      version: "1.0.0",
      data: { listingId: "MLS77", change: "create", status: "pending_images" },
    });
  });

  it("should run with a throwaway key when none is configured", async () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    service = new PropertyStateService(testConfig(null), logger);

    await service.start();

    expect(warn).toHaveBeenCalledWith(
      "ADDRESS_ENCRYPTION_KEY is not set; using a throwaway key for this process"
    );
  });

  it("should stop cleanly", async () => {
    const running = new PropertyStateService(testConfig(AesGcmCodec.generateKey()), silentLogger);
    await running.start();

    await running.stop();

    expect(running.lifecycle.getState()).toBe(ServiceState.STOPPED);
  });
});
