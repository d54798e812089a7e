/**
 * DiagnosticsLogger - Console logging for trajectory reconstruction
 *
 * Debug entries are only captured while the logger is enabled. Warnings
 * (numeric degeneracy guards) are always captured and printed, so a caller
 * can detect them without turning debug logging on.
 */

export type DiagnosticsLevel = "debug" | "warn";

/**
 * One captured log entry.
 */
export interface DiagnosticsLogEntry {
  timestamp: number;
  level: DiagnosticsLevel;
  /** Module that produced the entry, e.g. "FrameRotation" */
  scope: string;
  message: string;
  details?: Record<string, unknown>;
}

class DiagnosticsLoggerImpl {
  private enabled = false;
  private logs: DiagnosticsLogEntry[] = [];
  private maxLogs = 500;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[DIAGNOSTICS] Debug logging enabled. Use DiagnosticsLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[DIAGNOSTICS] Debug logging disabled.");
  }

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
   * Record a debug entry. No-op while disabled.
   */
  debug(scope: string, message: string, details?: Record<string, unknown>): void {
    if (!this.enabled) return;

    this.push({ timestamp: Date.now(), level: "debug", scope, message, details });
    console.debug(`[${scope}] ${message}`, details ?? "");
  }

  /**
   * Record and print a warning, whether or not debug logging is enabled.
   */
  warn(scope: string, message: string, details?: Record<string, unknown>): void {
    this.push({ timestamp: Date.now(), level: "warn", scope, message, details });
    console.warn(`[${scope}] ${message}`, details ?? "");
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[DIAGNOSTICS] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`${log.level.toUpperCase()} @ ${new Date(log.timestamp).toISOString()} [${log.scope}]`);
      console.log(log.message);
      if (log.details) {
        console.log("Details:", log.details);
      }
      console.groupEnd();
    }
  }

  getAllLogs(): readonly DiagnosticsLogEntry[] {
    return this.logs;
  }

  getWarnings(): readonly DiagnosticsLogEntry[] {
    return this.logs.filter((log) => log.level === "warn");
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
  }

  private push(entry: DiagnosticsLogEntry): void {
    this.logs.push(entry);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }
}

/**
 * Global diagnostics logger instance.
 */
export const DiagnosticsLogger = new DiagnosticsLoggerImpl();
