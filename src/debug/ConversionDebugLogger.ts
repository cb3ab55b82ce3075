/**
 * ConversionDebugLogger - Records lazy unit conversions for debugging
 *
 * Enable this to see exactly which conversions a piece of code triggers
 * and how often. The output can be copied and used to create test cases.
 */

import type { AngleUnit, DMSTriple } from "@/types";

export type LoggedValue = number | DMSTriple;

/**
 * Debug log entry for a single conversion.
 */
export interface ConversionDebugLog {
  timestamp: number;
  from: AngleUnit;
  to: AngleUnit;
  input: LoggedValue;
  output: LoggedValue;
}

/**
 * Debug log entry for an inverse trig call rejected by its domain check.
 */
export interface DomainErrorDebugLog {
  timestamp: number;
  fn: string;
  args: number[];
}

function describe(value: LoggedValue): string {
  return typeof value === "number" ? String(value) : `(${value.join(", ")})`;
}

class ConversionDebugLoggerImpl {
  private enabled = false;
  private logs: ConversionDebugLog[] = [];
  private domainErrors: DomainErrorDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: ConversionDebugLog | null = null;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[ANGLE DEBUG] Logging enabled. Use ConversionDebugLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[ANGLE DEBUG] Logging disabled.");
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
   * Log a conversion that populated a previously unset field.
   */
  logConversion(from: AngleUnit, to: AngleUnit, input: LoggedValue, output: LoggedValue): void {
    if (!this.enabled) return;

    const log: ConversionDebugLog = {
      timestamp: Date.now(),
      from,
      to,
      input: typeof input === "number" ? input : [...input],
      output: typeof output === "number" ? output : [...output],
    };

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  /**
   * Log an inverse trig call that failed its domain check.
   */
  logDomainError(fn: string, args: readonly number[]): void {
    if (!this.enabled) return;

    this.domainErrors.push({ timestamp: Date.now(), fn, args: [...args] });
    if (this.domainErrors.length > this.maxLogs) {
      this.domainErrors.shift();
    }
  }

  getLastLog(): ConversionDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly ConversionDebugLog[] {
    return [...this.logs];
  }

  getDomainErrors(): readonly DomainErrorDebugLog[] {
    return [...this.domainErrors];
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
    this.domainErrors = [];
    this.lastLog = null;
    console.log("[ANGLE DEBUG] Logs cleared.");
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[ANGLE DEBUG] Dumping logs...");
    console.log("Total conversions:", this.logs.length);

    for (const log of this.logs) {
      console.log(
        `${new Date(log.timestamp).toISOString()} ${log.from} -> ${log.to}: ${describe(log.input)} => ${describe(log.output)}`
      );
    }

    if (this.domainErrors.length > 0) {
      console.group("Domain errors");
      for (const entry of this.domainErrors) {
        console.log(`${entry.fn}(${entry.args.join(", ")})`);
      }
      console.groupEnd();
    }
  }
}

/**
 * Global debug logger instance.
 */
export const ConversionDebugLogger = new ConversionDebugLoggerImpl();
