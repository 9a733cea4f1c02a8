import { Logger, PropertyUpdateRequestedEvent } from "@estate-core/shared-utils";
import { ErrorCodes, isPropertyStateError } from "./errors";
import { PropertyStateManager } from "./manager";
import { parseUpdateRequest } from "./validation";

export interface HandlerDeps {
  manager: PropertyStateManager;
  logger: Logger;
}

// Problems with the request itself; redelivering would not help
const REQUEST_ERRORS: readonly string[] = [
  ErrorCodes.VALIDATION_FAILED,
  ErrorCodes.PROPERTY_NOT_FOUND,
];

export function createHandlers(deps: HandlerDeps) {
  const { manager, logger } = deps;

  return {
    async onPropertyUpdateRequested(evt: PropertyUpdateRequestedEvent): Promise<void> {
      try {
        const request = parseUpdateRequest(evt.data);
        const { state, outcome } = await manager.reconcile(request);

        logger.debug(`Handled ${evt.id} for property ${state.id}`, {
          change: outcome.change,
          rejected: outcome.rejectedFields.map((rejection) => rejection.field),
          statusRejection: outcome.statusRejection?.reason ?? null,
        });
      } catch (error) {
        if (isPropertyStateError(error) && REQUEST_ERRORS.includes(error.code)) {
          logger.warn(`Dropped update ${evt.id}: ${error.code}`, error.details);
          return;
        }
        logger.error(`Failed to handle update ${evt.id}:`, error);
        throw error;
      }
    },
  };
}

export type PropertyStateHandlers = ReturnType<typeof createHandlers>;
