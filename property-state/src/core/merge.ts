import {
  ATTRIBUTE_FIELDS,
  AttributeField,
  FieldProvenance,
  FieldRejection,
  ISO,
  NewStatusTransition,
  PropertyAttributes,
  PropertyRecord,
  PropertyUpdateRequest,
  ReconcileOutcome,
  ReconcileWarning,
  RequestAttributes,
  SourceKind,
  StatusRejection,
  TrustField,
  UpdatableField,
} from "./dto";
import { parseStatus, StatusRules } from "./status";
import { TrustPolicy } from "./trust";

/**
 * The current address as far as the merge can tell. An unreadable
 * address compares unequal to anything, so trust alone decides.
 */
export type StoredAddress =
  | { readable: true; value: string | null }
  | { readable: false };

export interface MergeContext {
  policy: TrustPolicy;
  statusRules: StatusRules;
  source: SourceKind;
  sourceName: string;
  observedAt: ISO;
  now: ISO;
}

export type MergeOutcome = Omit<ReconcileOutcome, "change" | "retries">;

export interface MergeResult {
  record: PropertyRecord;
  /** Plaintext address to encrypt and store; undefined keeps the stored one */
  address: string | undefined;
  transitions: NewStatusTransition[];
  outcome: MergeOutcome;
}

/**
 * Fold a sparse update into the current record, field by field. Pure:
 * the caller owns version bumps, encryption and persistence.
 */
export function mergeUpdate(
  current: PropertyRecord,
  storedAddress: StoredAddress,
  request: PropertyUpdateRequest,
  ctx: MergeContext
): MergeResult {
  return new MergeRun(current, storedAddress, request, ctx).run();
}

class MergeRun {
  private next: PropertyRecord;
  private address: string | undefined;
  private transitions: NewStatusTransition[] = [];
  private applied: UpdatableField[] = [];
  private unchanged: UpdatableField[] = [];
  private rejected: FieldRejection[] = [];
  private warnings: ReconcileWarning[] = [];
  private statusAccepted: boolean | null = null;
  private statusChanged = false;
  private statusRejection: StatusRejection | null = null;

  constructor(
    private current: PropertyRecord,
    private storedAddress: StoredAddress,
    private request: PropertyUpdateRequest,
    private ctx: MergeContext
  ) {
    this.next = {
      ...current,
      media: [...current.media],
      provenance: { ...current.provenance },
    };
  }

  run(): MergeResult {
    this.mergeListingId();
    this.mergeAddress();
    for (const field of ATTRIBUTE_FIELDS) {
      this.mergeAttribute(field);
    }
    this.mergeMedia();
    this.mergeInternalNotes();
    this.mergeStatus();

    if (this.applied.length > 0) {
      this.next.updatedAt = this.ctx.now;
    }

    return {
      record: this.next,
      address: this.address,
      transitions: this.transitions,
      outcome: {
        appliedFields: this.applied,
        unchangedFields: this.unchanged,
        rejectedFields: this.rejected,
        statusAccepted: this.statusAccepted,
        statusChanged: this.statusChanged,
        statusRejection: this.statusRejection,
        warnings: this.warnings,
      },
    };
  }

  private stamp(): FieldProvenance {
    return {
      source: this.ctx.source,
      sourceName: this.ctx.sourceName,
      at: this.ctx.observedAt,
    };
  }

  /**
   * Whether this source may overwrite a field holding a different value.
   * Exempt fields only ask for a positive rank.
   */
  private admits(field: TrustField, unset: boolean): boolean {
    const { policy, source, observedAt } = this.ctx;
    if (policy.modeOf(field) === "exempt") {
      return policy.authority(field, source) > 0;
    }
    if (unset) return true;
    return policy.wins(
      field,
      { source, at: observedAt },
      this.current.provenance[field]
    );
  }

  private reject(field: TrustField): void {
    this.rejected.push({
      field,
      reason: "trust_rejected",
      heldBy: this.current.provenance[field]?.source ?? null,
    });
  }

  private accept(field: TrustField): void {
    this.applied.push(field);
    if (this.ctx.policy.modeOf(field) !== "exempt") {
      this.next.provenance[field] = this.stamp();
    }
  }

  // A listing id attaches once, to a record that has none
  private mergeListingId(): void {
    const { listingId } = this.request;
    if (listingId === undefined) return;
    if (this.current.listingId === null) {
      this.next.listingId = listingId;
      this.applied.push("listingId");
    }
  }

  private mergeAddress(): void {
    const incoming = this.request.address;
    if (incoming === undefined) return;

    const stored = this.storedAddress;
    if (stored.readable && stored.value === incoming) {
      this.unchanged.push("address");
      return;
    }
    if (!stored.readable) {
      this.warnings.push("address_unreadable");
    }

    const unset = stored.readable && stored.value === null;
    if (this.admits("address", unset)) {
      this.address = incoming;
      this.accept("address");
    } else {
      this.reject("address");
    }
  }

  private mergeAttribute<K extends AttributeField>(field: K): void {
    const request: RequestAttributes = this.request;
    const incoming = request[field];
    if (incoming === undefined) return;

    const current: PropertyAttributes = this.current;
    const existing = current[field];
    if (existing === incoming) {
      this.unchanged.push(field);
      return;
    }

    if (this.admits(field, existing === null)) {
      const attributes: PropertyAttributes = this.next;
      attributes[field] = incoming;
      this.accept(field);
    } else {
      this.reject(field);
    }
  }

  /**
   * Appends are open to every source. A clear replaces the whole set and
   * is ranked like any other write; a rejected clear still lets the
   * appends through.
   */
  private mergeMedia(): void {
    const { media, clearMedia } = this.request;
    let changed = false;

    if (clearMedia === true && this.current.media.length > 0) {
      if (this.admits("media", false)) {
        this.next.media = [];
        this.next.provenance.media = this.stamp();
        changed = true;
      } else {
        this.reject("media");
      }
    }

    if (media !== undefined) {
      const additions = [...new Set(media)].filter(
        (url) => !this.next.media.includes(url)
      );
      if (additions.length > 0) {
        this.next.media = [...this.next.media, ...additions];
        if (!this.next.provenance.media) {
          this.next.provenance.media = this.stamp();
        }
        changed = true;
      }
    }

    if (changed) {
      this.applied.push("media");
    } else if (media !== undefined || clearMedia === true) {
      if (!this.rejected.some((rejection) => rejection.field === "media")) {
        this.unchanged.push("media");
      }
    }
  }

  private mergeInternalNotes(): void {
    const incoming = this.request.internalNotes;
    if (incoming === undefined) return;

    if (this.current.internalNotes === incoming) {
      this.unchanged.push("internalNotes");
      return;
    }
    if (this.admits("internalNotes", this.current.internalNotes === null)) {
      this.next.internalNotes = incoming;
      this.accept("internalNotes");
    } else {
      this.reject("internalNotes");
    }
  }

  private mergeStatus(): void {
    const requested = this.request.status;
    if (requested === undefined) return;

    const from = this.current.status;
    const proposed = parseStatus(requested);

    if (proposed === null) {
      this.refuseStatus({ reason: "unknown_status", from, requested });
      return;
    }
    if (proposed === from) {
      this.statusAccepted = true;
      this.unchanged.push("status");
      return;
    }

    const { statusRules, policy, source } = this.ctx;
    if (!statusRules.isLegalFor(source, from, proposed)) {
      this.refuseStatus({ reason: "illegal_transition", from, requested });
      return;
    }

    // Happy-path moves need only a non-zero say over status
    const authorized =
      (statusRules.isForward(from, proposed) &&
        policy.authority("status", source) > 0) ||
      this.admits("status", false);

    if (!authorized) {
      this.reject("status");
      this.refuseStatus({ reason: "trust_rejected", from, requested });
      return;
    }

    this.next.status = proposed;
    this.next.statusUpdatedAt = this.ctx.now;
    this.accept("status");
    this.statusAccepted = true;
    this.statusChanged = true;
    this.transitions.push({
      from,
      to: proposed,
      source,
      sourceName: this.ctx.sourceName,
      at: this.ctx.now,
    });
  }

  private refuseStatus(rejection: StatusRejection): void {
    this.statusAccepted = false;
    this.statusRejection = rejection;
  }
}
