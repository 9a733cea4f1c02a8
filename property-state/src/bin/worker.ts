#!/usr/bin/env node

/**
 * Property State worker: consumes property_update_requested events
 */

import { ConsoleLogger } from "@estate-core/shared-utils";
import { loadConfig, SERVICE_NAME } from "../config/env";
import { PropertyStateService } from "../service-config";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new ConsoleLogger(SERVICE_NAME, config.logLevel);
  const service = new PropertyStateService(config, logger, {
    handleSignals: true,
  });

  await service.start();
  await service.lifecycle.waitForShutdown();
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Property state worker crashed:", error);
    process.exit(1);
  });
}
