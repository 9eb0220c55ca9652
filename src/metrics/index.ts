export { RequestMetrics, formatUptime } from "./request-metrics.js";
export type {
  AgentRequestMetrics,
  RequestMetricsConfig,
  RequestMetricsSnapshot,
  RequestOutcome,
} from "./types.js";
