import type {
  AgentRequestMetrics,
  RequestMetricsConfig,
  RequestMetricsSnapshot,
  RequestOutcome,
} from "./types.js";

interface Counter {
  requests: number;
  errors: number;
  totalMs: number;
}

function emptyCounter(): Counter {
  return { requests: 0, errors: 0, totalMs: 0 };
}

function average(counter: Counter): number {
  return counter.requests > 0 ? Math.round(counter.totalMs / counter.requests) : 0;
}

export function formatUptime(uptimeSeconds: number): string {
  const hours = Math.floor(uptimeSeconds / 3600);
  const minutes = Math.floor((uptimeSeconds % 3600) / 60);
  const seconds = Math.floor(uptimeSeconds % 60);
  return `${hours}h ${minutes}m ${seconds}s`;
}

// ============================================
// REQUEST METRICS
// ============================================

/**
 * Counts chat requests, failures and response times since start-up.
 */
export class RequestMetrics {
  private now: () => number;
  private startedAt: number;
  private totals: Counter = emptyCounter();
  private errorsByKind = new Map<string, number>();
  private byAgent = new Map<string, Counter>();

  constructor(config: RequestMetricsConfig = {}) {
    this.now = config.now ?? (() => Date.now());
    this.startedAt = this.now();
  }

  /**
   * Start timing a request. The returned function reports elapsed milliseconds.
   */
  startTimer(): () => number {
    const started = this.now();
    return () => Math.max(0, this.now() - started);
  }

  record(outcome: RequestOutcome): void {
    this.add(this.totals, outcome);

    if (!outcome.success) {
      const kind = outcome.errorKind ?? "unknown";
      this.errorsByKind.set(kind, (this.errorsByKind.get(kind) ?? 0) + 1);
    }

    if (outcome.agentId !== undefined) {
      let counter = this.byAgent.get(outcome.agentId);
      if (!counter) {
        counter = emptyCounter();
        this.byAgent.set(outcome.agentId, counter);
      }
      this.add(counter, outcome);
    }
  }

  snapshot(): RequestMetricsSnapshot {
    const uptimeSeconds = (this.now() - this.startedAt) / 1000;
    const agents: Record<string, AgentRequestMetrics> = {};
    for (const [agentId, counter] of this.byAgent) {
      agents[agentId] = {
        requests: counter.requests,
        errors: counter.errors,
        averageResponseMs: average(counter),
      };
    }

    return {
      startedAt: new Date(this.startedAt).toISOString(),
      uptimeSeconds,
      uptimeFormatted: formatUptime(uptimeSeconds),
      totalRequests: this.totals.requests,
      totalErrors: this.totals.errors,
      errorRate: (this.totals.errors / Math.max(this.totals.requests, 1)) * 100,
      requestsPerSecond: this.totals.requests / Math.max(uptimeSeconds, 1),
      averageResponseMs: average(this.totals),
      errorsByKind: Object.fromEntries(this.errorsByKind),
      agents,
    };
  }

  private add(counter: Counter, outcome: RequestOutcome): void {
    counter.requests++;
    counter.totalMs += outcome.durationMs;
    if (!outcome.success) counter.errors++;
  }
}
