/**
 * Property State service wiring: store, bus, codec and engine
 */

import {
  BusPort,
  ConsoleLogger,
  createBus,
  Logger,
  ServiceLifecycle,
  ServiceState,
} from "@estate-core/shared-utils";
import { Pool } from "pg";
import { BusEventsAdapter } from "./adapters/bus.adapter";
import { MemoryPropertyStore } from "./adapters/store.memory";
import { SqlPropertyStore } from "./adapters/store.sql";
import { AppConfig, SERVICE_NAME } from "./config/env";
import { AesGcmCodec } from "./core/codec";
import { createHandlers } from "./core/handlers";
import { PropertyStateManager } from "./core/manager";
import { PropertyStorePort } from "./core/ports";
import { TrustPolicy } from "./core/trust";

export interface ServiceOptions {
  /** Installs signal handlers; off for embedded use and tests */
  handleSignals?: boolean;
}

export class PropertyStateService {
  readonly lifecycle: ServiceLifecycle;
  private logger: Logger;
  private bus: BusPort | null = null;
  private managerInstance: PropertyStateManager | null = null;

  constructor(
    private config: AppConfig,
    logger?: Logger,
    options: ServiceOptions = {}
  ) {
    this.logger = logger ?? new ConsoleLogger(SERVICE_NAME, config.logLevel);
    this.lifecycle = new ServiceLifecycle(this.logger, {
      handleSignals: options.handleSignals ?? false,
    });
  }

  get manager(): PropertyStateManager {
    if (!this.managerInstance) {
      throw new Error("Service not started");
    }
    return this.managerInstance;
  }

  async start(): Promise<void> {
    this.lifecycle.setState(ServiceState.STARTING);
    this.logger.info(
      `Starting (mode=${this.config.mode}, store=${this.config.storeAdapter}, bus=${this.config.busType})`
    );

    try {
      const store = this.createStore();
      const bus = createBus(
        {
          type: this.config.busType,
          serviceName: SERVICE_NAME,
          redisUrl: this.config.redisUrl,
        },
        this.logger
      );
      this.bus = bus;
      this.lifecycle.addShutdownHandler(async () => {
        await bus.close?.();
      });

      const manager = new PropertyStateManager(
        {
          store,
          codec: this.createCodec(),
          logger: this.logger,
          policy: new TrustPolicy(this.config.trustPolicy),
          events: new BusEventsAdapter(bus),
        },
        this.config.engine
      );
      this.managerInstance = manager;

      const handlers = createHandlers({ manager, logger: this.logger });
      await bus.subscribe("property_update_requested", (evt) =>
        handlers.onPropertyUpdateRequested(evt)
      );

      this.lifecycle.setState(ServiceState.RUNNING);
      this.logger.info("Listening for property_update_requested events");
    } catch (error) {
      this.lifecycle.handleError(
        error instanceof Error ? error : new Error(String(error)),
        "start"
      );
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.lifecycle.shutdown("stop");
  }

  getBus(): BusPort | null {
    return this.bus;
  }

  private createStore(): PropertyStorePort {
    if (this.config.storeAdapter === "MEMORY") {
      this.logger.warn("Using the in-memory store; nothing survives a restart");
      return new MemoryPropertyStore();
    }

    const { db } = this.config;
    const pool = new Pool({
      host: db.host,
      port: db.port,
      user: db.user,
      password: db.password,
      database: db.name,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
    this.lifecycle.addShutdownHandler(async () => {
      this.logger.info("Closing database connections...");
      await pool.end();
    });
    return new SqlPropertyStore(pool);
  }

  private createCodec(): AesGcmCodec {
    const { currentKey, priorKeys } = this.config.encryption;
    if (currentKey === null) {
      this.logger.warn(
        "ADDRESS_ENCRYPTION_KEY is not set; using a throwaway key for this process"
      );
      return AesGcmCodec.fromBase64(AesGcmCodec.generateKey());
    }
    return AesGcmCodec.fromBase64(currentKey, priorKeys);
  }
}
