import { EventEmitter } from "events";
import { Logger, ServiceLifecycleEvents, ServiceState } from "./types";

export interface LifecycleOptions {
  shutdownTimeoutMs?: number;
  /** Install SIGTERM/SIGINT handlers that run shutdown and exit */
  handleSignals?: boolean;
}

/**
 * Service lifecycle manager
 * Handles state transitions and graceful shutdown
 */
export class ServiceLifecycle extends EventEmitter {
  private state: ServiceState = ServiceState.INITIALIZING;
  private startTime: Date = new Date();
  private shutdownHandlers: Array<() => Promise<void>> = [];
  private shutdownTimeoutMs: number;
  private isShuttingDown = false;

  constructor(private logger: Logger, options: LifecycleOptions = {}) {
    super();
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 30000;
    if (options.handleSignals) {
      this.setupProcessHandlers();
    }
  }

  /**
   * Typed subscription to lifecycle events
   */
  onLifecycle<K extends keyof ServiceLifecycleEvents>(
    event: K,
    listener: (payload: ServiceLifecycleEvents[K]) => void
  ): this {
    return this.on(event, listener);
  }

  private notify<K extends keyof ServiceLifecycleEvents>(
    event: K,
    payload: ServiceLifecycleEvents[K]
  ): void {
    this.emit(event, payload);
  }

  getState(): ServiceState {
    return this.state;
  }

  getUptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime.getTime()) / 1000);
  }

  isHealthy(): boolean {
    return this.state === ServiceState.RUNNING;
  }

  setState(newState: ServiceState): void {
    const oldState = this.state;
    this.state = newState;

    this.notify("state:changed", { from: oldState, to: newState });
    this.logger.debug(`State changed: ${oldState} → ${newState}`);
  }

  /**
   * Register cleanup work; handlers run in parallel on shutdown
   */
  addShutdownHandler(handler: () => Promise<void>): void {
    this.shutdownHandlers.push(handler);
  }

  /**
   * Start graceful shutdown process
   */
  async shutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.info("Already shutting down, ignoring signal");
      return;
    }

    this.isShuttingDown = true;
    const shutdownStart = Date.now();

    this.logger.info(`Received ${signal}, starting graceful shutdown...`);
    this.setState(ServiceState.STOPPING);
    this.notify("shutdown:requested", { signal });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeoutMs}ms`));
      }, this.shutdownTimeoutMs);
    });

    try {
      await Promise.race([this.runShutdownHandlers(), timeout]);

      const durationMs = Date.now() - shutdownStart;
      this.logger.info(`Graceful shutdown completed in ${durationMs}ms`);

      this.setState(ServiceState.STOPPED);
      this.notify("shutdown:complete", { durationMs });
    } catch (error) {
      this.handleError(toError(error), "shutdown");
    } finally {
      clearTimeout(timer);
    }
  }

  handleError(error: Error, context?: string): void {
    this.logger.error(`Service error in ${context ?? "unknown"}:`, error);
    this.setState(ServiceState.ERROR);
    this.notify("service:error", { error, context });
  }

  /**
   * Resolves once the service reached STOPPED or ERROR
   */
  async waitForShutdown(): Promise<void> {
    return new Promise((resolve) => {
      if (
        this.state === ServiceState.STOPPED ||
        this.state === ServiceState.ERROR
      ) {
        resolve();
        return;
      }

      this.once("shutdown:complete", () => resolve());
      this.once("service:error", () => resolve());
    });
  }

  private setupProcessHandlers(): void {
    const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGUSR2"];

    signals.forEach((signal) => {
      process.on(signal, () => {
        this.shutdown(signal)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            this.logger.error("Shutdown failed:", error);
            process.exit(1);
          });
      });
    });

    process.on("uncaughtException", (error) => {
      this.handleError(error, "uncaughtException");
      process.exit(1);
    });

    process.on("unhandledRejection", (reason) => {
      this.handleError(toError(reason), "unhandledRejection");
      process.exit(1);
    });
  }

  private async runShutdownHandlers(): Promise<void> {
    if (this.shutdownHandlers.length === 0) {
      return;
    }

    this.logger.info(
      `Running ${this.shutdownHandlers.length} shutdown handlers...`
    );

    const results = await Promise.allSettled(
      this.shutdownHandlers.map((handler) => handler())
    );

    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );

    if (failures.length > 0) {
      failures.forEach((failure, index) => {
        this.logger.error(`Shutdown handler ${index} failed:`, failure.reason);
      });
      throw new Error(`${failures.length} shutdown handlers failed`);
    }
  }
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
