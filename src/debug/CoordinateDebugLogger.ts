/**
 * CoordinateDebugLogger - Records failed constructions and arithmetic
 *
 * Disabled unless enabled here or through `configureCoordinates({ debugLogging: true })`.
 * Recording never changes control flow: the error is still thrown by the caller.
 */

import { getCoordinateConfig } from "@/config/coordinateConfig";
import type { CoordinateError, CoordinateErrorKind } from "@/errors";

/**
 * Debug log entry for a single failure.
 */
export interface CoordinateDebugLog {
  timestamp: number;
  kind: CoordinateErrorKind;
  errorName: string;
  message: string;
}

/**
 * Global debug logger instance.
 */
class CoordinateDebugLoggerImpl {
  /** Explicit override; null defers to the library configuration */
  private enabled: boolean | null = null;
  private logs: CoordinateDebugLog[] = [];
  private lastLog: CoordinateDebugLog | null = null;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[COORDINATE DEBUG] Logging enabled. Use CoordinateDebugLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[COORDINATE DEBUG] Logging disabled.");
  }

  /**
   * Toggle debug logging.
   */
  toggle(): void {
    if (this.isEnabled()) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled ?? getCoordinateConfig().debugLogging;
  }

  /**
   * Record an error about to be thrown.
   */
  logError(error: CoordinateError): void {
    if (!this.isEnabled()) return;

    const log: CoordinateDebugLog = {
      timestamp: Date.now(),
      kind: error.kind,
      errorName: error.name,
      message: error.message,
    };

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    const maxLogs = getCoordinateConfig().maxDebugLogs;
    while (this.logs.length > maxLogs) {
      this.logs.shift();
    }

    console.log(`[COORDINATE DEBUG] ${error.name}: ${error.message}`);
  }

  getLogs(): readonly CoordinateDebugLog[] {
    return [...this.logs];
  }

  getLastLog(): CoordinateDebugLog | null {
    return this.lastLog;
  }

  /**
   * Clear all captured logs.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
  }

  /**
   * Reset to the initial state: no logs, enabled state taken from configuration.
   */
  reset(): void {
    this.clear();
    this.enabled = null;
  }

  /**
   * Dump all logs to console as JSON.
   */
  dump(): string {
    const output = JSON.stringify(this.logs, null, 2);
    console.log("[COORDINATE DEBUG] Full log dump:");
    console.log(output);
    return output;
  }
}

export const CoordinateDebugLogger = new CoordinateDebugLoggerImpl();

/**
 * Pass an error through the debug logger on its way to `throw`.
 *
 * @example throw reported(new ConstructionError("..."));
 */
export function reported<E extends CoordinateError>(error: E): E {
  CoordinateDebugLogger.logError(error);
  return error;
}
