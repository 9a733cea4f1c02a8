export * from "./core/dto";
export * from "./core/errors";
export * from "./core/ports";
export { AesGcmCodec } from "./core/codec";
export type { FieldCodec } from "./core/codec";
export {
  DEFAULT_SOURCE_ALIASES,
  DEFAULT_TRUST_POLICY,
  parseTrustPolicy,
  TrustPolicy,
} from "./core/trust";
export type { FieldRule, MergeMode, TrustPolicyConfig } from "./core/trust";
export {
  canonicalStatus,
  DEFAULT_STATUS_RULES,
  DEFAULT_TRANSITIONS,
  isPublic,
  isTerminal,
  parseStatus,
  StatusRules,
} from "./core/status";
export type { StatusRulesConfig, TransitionTable } from "./core/status";
export { Reconciler } from "./core/reconcile";
export type { ReconcilerConfig, ReconcilerDeps } from "./core/reconcile";
export { PropertyReader } from "./core/reader";
export { StatsAggregator } from "./core/stats";
export { PropertyStateManager } from "./core/manager";
export type { PropertyStateConfig, PropertyStateDeps } from "./core/manager";
export { createHandlers } from "./core/handlers";
export { parseConflictResolution, parseUpdateRequest } from "./core/validation";
export { MemoryPropertyStore } from "./adapters/store.memory";
export { SqlPropertyStore } from "./adapters/store.sql";
export type { SqlClient, SqlPool } from "./adapters/store.sql";
export { BusEventsAdapter } from "./adapters/bus.adapter";
export { loadConfig } from "./config/env";
export type { AppConfig } from "./config/env";
export { PropertyStateService } from "./service-config";
