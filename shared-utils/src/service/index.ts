export { ConsoleLogger, isLogLevel, silentLogger } from "./logger";
export { ServiceLifecycle } from "./lifecycle";
export type { LifecycleOptions } from "./lifecycle";
export { ServiceState } from "./types";
export type { Logger, LogLevel, ServiceLifecycleEvents } from "./types";
