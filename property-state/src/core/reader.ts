import { Logger } from "@estate-core/shared-utils";
import {
  PageOptions,
  PropertyFilter,
  PropertyRecord,
  PropertyState,
  PropertyStatus,
  StatusTransition,
} from "./dto";
import { DecryptionError } from "./errors";
import { FieldCodec } from "./codec";
import { PropertyReadPort } from "./ports";
import { canonicalStatus, PUBLIC_STATUSES } from "./status";
import { StoredAddress } from "./merge";
import { parsePage } from "./validation";

/**
 * Decrypt a stored address. Only a DecryptionError is treated as
 * unreadable; anything else propagates.
 */
export function readAddress(
  codec: FieldCodec,
  record: PropertyRecord,
  logger: Logger
): StoredAddress {
  if (record.addressCiphertext === null) {
    return { readable: true, value: null };
  }
  try {
    return { readable: true, value: codec.decrypt(record.addressCiphertext) };
  } catch (error) {
    if (error instanceof DecryptionError) {
      logger.warn(`Stored address of property ${record.id} is unreadable`, {
        reason: error.details.reason,
      });
      return { readable: false };
    }
    throw error;
  }
}

export function toPropertyState(
  record: PropertyRecord,
  address: StoredAddress
): PropertyState {
  const { addressCiphertext: _ciphertext, ...rest } = record;
  return {
    ...rest,
    media: [...record.media],
    provenance: { ...record.provenance },
    address: address.readable ? address.value : null,
    addressAvailable: address.readable,
  };
}

// `available` is an alias of `active` for anything that reads
function statusGroup(status: PropertyStatus): PropertyStatus[] {
  return canonicalStatus(status) === "active" ? ["active", "available"] : [status];
}

/**
 * Read side of the canonical store. Everything returned is decrypted;
 * nothing here writes.
 */
export class PropertyReader {
  constructor(
    private store: PropertyReadPort,
    private codec: FieldCodec,
    private logger: Logger
  ) {}

  async getByIdentity(propertyId: string): Promise<PropertyState | null> {
    const record = await this.store.getByIdentity(propertyId);
    return record ? this.toState(record) : null;
  }

  async getByListingId(listingId: string): Promise<PropertyState | null> {
    const record = await this.store.getByListingId(listingId);
    return record ? this.toState(record) : null;
  }

  async listByStatus(
    status: PropertyStatus,
    page?: PageOptions
  ): Promise<PropertyState[]> {
    return this.list({ statuses: statusGroup(status) }, page);
  }

  /**
   * Properties that may be shown publicly or offered for showings
   */
  async listPublic(page?: PageOptions): Promise<PropertyState[]> {
    return this.list({ statuses: PUBLIC_STATUSES }, page);
  }

  async list(filter: PropertyFilter, page?: PageOptions): Promise<PropertyState[]> {
    const records = await this.store.list(filter, parsePage(page));
    return records.map((record) => this.toState(record));
  }

  async getTransitionLog(propertyId: string): Promise<StatusTransition[]> {
    return this.store.getTransitions(propertyId);
  }

  toState(record: PropertyRecord): PropertyState {
    return toPropertyState(record, readAddress(this.codec, record, this.logger));
  }
}
