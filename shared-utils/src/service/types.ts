/**
 * Logger interface shared by every component that logs.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Service lifecycle states
 */
export enum ServiceState {
  INITIALIZING = "initializing",
  STARTING = "starting",
  RUNNING = "running",
  STOPPING = "stopping",
  STOPPED = "stopped",
  ERROR = "error",
}

/**
 * Service lifecycle events
 */
export interface ServiceLifecycleEvents {
  "state:changed": { from: ServiceState; to: ServiceState };
  "service:error": { error: Error; context?: string };
  "shutdown:requested": { signal: string };
  "shutdown:complete": { durationMs: number };
}
