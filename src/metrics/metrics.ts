import { Registry, collectDefaultMetrics, Counter, Histogram } from 'prom-client';

const register = new Registry();

let defaultMetricsRegistered = false;

// Process metrics are opt-in so tests do not start collectors.
export function registerDefaultMetrics(): void {
  if (defaultMetricsRegistered) {
    return;
  }
  collectDefaultMetrics({ register });
  defaultMetricsRegistered = true;
}

export const requestCounter = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

export const responseTimeHistogram = new Histogram({
  name: 'http_response_time_seconds',
  help: 'HTTP response time in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

export const toolCallCounter = new Counter({
  name: 'ledger_tool_calls_total',
  help: 'Ledger tool invocations by tool and outcome',
  labelNames: ['tool', 'outcome'],
  registers: [register],
});

export default register;
