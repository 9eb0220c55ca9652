// ============================================
// REQUEST METRICS TYPES
// ============================================

export interface RequestMetricsConfig {
  now?: () => number; // epoch milliseconds
}

export interface RequestOutcome {
  agentId?: string; // omitted for requests that named no known agent
  success: boolean;
  durationMs: number;
  errorKind?: string;
}

export interface AgentRequestMetrics {
  requests: number;
  errors: number;
  averageResponseMs: number;
}

export interface RequestMetricsSnapshot {
  startedAt: string;
  uptimeSeconds: number;
  uptimeFormatted: string;
  totalRequests: number;
  totalErrors: number;
  errorRate: number; // percent of requests that failed
  requestsPerSecond: number;
  averageResponseMs: number;
  errorsByKind: Record<string, number>;
  agents: Record<string, AgentRequestMetrics>;
}
