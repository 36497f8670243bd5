/**
 * ApproximationDebugLogger - Logging for debugging curve discretization
 *
 * Enable this to capture the segment counts chosen for each approximation.
 * The output can be copied and used to create test setups.
 */

import type { CurveType } from "@/types";

/**
 * Debug log entry for a single approximation.
 */
export interface ApproximationDebugLog {
  timestamp: number;
  kind: CurveType;
  maxError: number;
  segmentCount: number;
  vertexCount: number;
}

/**
 * Collects approximation logs while enabled.
 */
class ApproximationDebugLoggerImpl {
  private enabled = false;
  private logs: ApproximationDebugLog[] = [];
  private maxLogs = 100;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log(
      "[APPROXIMATION DEBUG] Logging enabled. Use ApproximationDebugLogger.dump() to see logs."
    );
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[APPROXIMATION DEBUG] Logging disabled.");
  }

  /**
   * Toggle debug logging.
   */
  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record one approximation.
   */
  logApproximation(entry: Omit<ApproximationDebugLog, "timestamp">): void {
    if (!this.enabled) return;

    const log: ApproximationDebugLog = { timestamp: Date.now(), ...entry };
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(
      `[APPROXIMATION DEBUG] ${entry.kind}: maxError=${entry.maxError}, ` +
        `segments=${entry.segmentCount}, vertices=${entry.vertexCount}`
    );
  }

  getLogs(): readonly ApproximationDebugLog[] {
    return this.logs;
  }

  getLastLog(): ApproximationDebugLog | null {
    return this.logs[this.logs.length - 1] ?? null;
  }

  clear(): void {
    this.logs = [];
  }

  /**
   * Print all captured logs as JSON.
   */
  dump(): string {
    const json = JSON.stringify(this.logs, null, 2);
    console.log(json);
    return json;
  }
}

/**
 * Global debug logger instance.
 */
export const ApproximationDebugLogger = new ApproximationDebugLoggerImpl();
