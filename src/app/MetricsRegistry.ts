import type { TimePort } from "../ports/sys/TimePort";
import { NodeTime } from "../adapters/sys/NodeTime";
import { RingBuffer } from "../domain/metrics/RingBuffer";
import { describeFailure, type ExecutionResult } from "../domain/execution/ExecutionResult";

export const ERROR_LOG_CAPACITY = 100;
export const ERROR_MESSAGE_MAX_CHARS = 500;
export const DEGRADED_ERROR_RATE = 0.1;

export interface ErrorRecord {
  timestamp: number;
  message: string;
}

export interface ToolMetrics {
  callCount: number;
  successCount: number;
  errorCount: number;
  totalDurationMs: number;
  lastExecution: number | null;
  errors: ErrorRecord[];
}

export interface ToolHealth {
  callCount: number;
  successCount: number;
  errorCount: number;
  successRate: number;
  averageDurationMs: number;
  lastExecution: string | null;
  recentErrors: Array<{ timestamp: string; message: string }>;
}

export type HealthStatus = "healthy" | "degraded";

export interface HealthReport {
  status: HealthStatus;
  totalCalls: number;
  totalErrors: number;
  errorRate: number;
  tools: Record<string, ToolHealth>;
}

export interface MetricsRegistryOptions {
  enabled?: boolean;
  errorCapacity?: number;
  degradedThreshold?: number;
  /** How many recent errors each tool lists in the health view. */
  recentErrorsInHealth?: number;
}

interface ToolCounters {
  callCount: number;
  successCount: number;
  errorCount: number;
  totalDurationMs: number;
  lastExecution: number | null;
  errors: RingBuffer<ErrorRecord>;
}

/**
 * Per-tool call statistics for the life of the process. Counters only grow;
 * the error log keeps the most recent entries.
 */
export class MetricsRegistry {
  private readonly counters = new Map<string, ToolCounters>();
  private readonly enabled: boolean;
  private readonly errorCapacity: number;
  private readonly degradedThreshold: number;
  private readonly recentErrorsInHealth: number;

  constructor(options: MetricsRegistryOptions = {}, private readonly time: TimePort = new NodeTime()) {
    this.enabled = options.enabled ?? true;
    this.errorCapacity = options.errorCapacity ?? ERROR_LOG_CAPACITY;
    this.degradedThreshold = options.degradedThreshold ?? DEGRADED_ERROR_RATE;
    this.recentErrorsInHealth = options.recentErrorsInHealth ?? 5;
  }

  record(toolName: string, result: ExecutionResult): void {
    if (!this.enabled) return;

    const counters = this.countersFor(toolName);
    const now = this.time.now();
    counters.callCount += 1;
    counters.totalDurationMs += Math.max(0, result.durationMs);
    counters.lastExecution = now;

    if (result.outcome === "success") {
      counters.successCount += 1;
      return;
    }

    counters.errorCount += 1;
    counters.errors.push({
      timestamp: now,
      message: describeFailure(result).slice(0, ERROR_MESSAGE_MAX_CHARS),
    });
  }

  stats(toolName: string): ToolMetrics | undefined {
    const counters = this.counters.get(toolName);
    return counters ? snapshot(counters) : undefined;
  }

  allStats(): Record<string, ToolMetrics> {
    const out: Record<string, ToolMetrics> = {};
    for (const [name, counters] of this.counters) {
      out[name] = snapshot(counters);
    }
    return out;
  }

  health(): HealthReport {
    let totalCalls = 0;
    let totalErrors = 0;
    const tools: Record<string, ToolHealth> = {};

    for (const [name, counters] of this.counters) {
      totalCalls += counters.callCount;
      totalErrors += counters.errorCount;
      const hasCalls = counters.callCount > 0;
      const errors = counters.errors.toArray();
      tools[name] = {
        callCount: counters.callCount,
        successCount: counters.successCount,
        errorCount: counters.errorCount,
        successRate: hasCalls ? counters.successCount / counters.callCount : 0,
        averageDurationMs: hasCalls ? counters.totalDurationMs / counters.callCount : 0,
        lastExecution:
          counters.lastExecution === null ? null : this.time.toISOString(counters.lastExecution),
        recentErrors: errors
          .slice(Math.max(0, errors.length - this.recentErrorsInHealth))
          .map((record) => ({
            timestamp: this.time.toISOString(record.timestamp),
            message: record.message,
          })),
      };
    }

    const errorRate = totalCalls > 0 ? totalErrors / totalCalls : 0;
    return {
      status: errorRate > this.degradedThreshold ? "degraded" : "healthy",
      totalCalls,
      totalErrors,
      errorRate,
      tools,
    };
  }

  private countersFor(toolName: string): ToolCounters {
    let counters = this.counters.get(toolName);
    if (!counters) {
      counters = {
        callCount: 0,
        successCount: 0,
        errorCount: 0,
        totalDurationMs: 0,
        lastExecution: null,
        errors: new RingBuffer<ErrorRecord>(this.errorCapacity),
      };
      this.counters.set(toolName, counters);
    }
    return counters;
  }
}

function snapshot(counters: ToolCounters): ToolMetrics {
  return {
    callCount: counters.callCount,
    successCount: counters.successCount,
    errorCount: counters.errorCount,
    totalDurationMs: counters.totalDurationMs,
    lastExecution: counters.lastExecution,
    errors: counters.errors.toArray(),
  };
}
