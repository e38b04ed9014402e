/**
 * HTTP Metrics Middleware
 *
 * Tracks HTTP request metrics for monitoring and alerting:
 * - Total requests by method, path, and status code
 * - Request duration/latency
 *
 * Metrics exposed:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path}
 */

import { Request, Response, NextFunction } from 'express';

interface RequestCount {
  method: string;
  path: string;
  status: number;
  count: number;
}

interface RequestDurations {
  method: string;
  path: string;
  durations: number[];
}

// Keep only the last N durations per endpoint to limit memory
const MAX_DURATION_SAMPLES = 1000;

// In-memory storage, keyed by "METHOD route[ status]"
const requestCounts = new Map<string, RequestCount>();
const requestDurations = new Map<string, RequestDurations>();

// Requests that matched no route (404s, body-parser failures) share one series
export const UNMATCHED_ROUTE = 'unmatched';

/**
 * Label a request by the route pattern it matched, e.g. /user/:username
 * Raw request paths are never used as labels.
 */
export function routeLabel(req: Request): string {
  // Typed `any` by @types/express
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return UNMATCHED_ROUTE;
}

/**
 * Escape a Prometheus label value (backslash, double quote, newline)
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Middleware to track HTTP request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  // Skip tracking for metrics and health endpoints to avoid noise
  if (req.path === '/metrics' || req.path === '/health') {
    next();
    return;
  }

  const startTime = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000; // Convert to seconds
    const method = req.method;
    const path = routeLabel(req);
    const status = res.statusCode;

    const countKey = `${method} ${path} ${status}`;
    const counter = requestCounts.get(countKey) ?? { method, path, status, count: 0 };
    counter.count += 1;
    requestCounts.set(countKey, counter);

    const durationKey = `${method} ${path}`;
    const samples = requestDurations.get(durationKey) ?? { method, path, durations: [] };
    samples.durations.push(duration);
    if (samples.durations.length > MAX_DURATION_SAMPLES) {
      samples.durations.shift();
    }
    requestDurations.set(durationKey, samples);
  });

  next();
}

/**
 * Get all HTTP request metrics in Prometheus format
 */
export function getHttpMetrics(): string[] {
  const metrics: string[] = [];

  // ============================================
  // HTTP Requests Total (Counter)
  // ============================================
  metrics.push('# HELP http_requests_total Total HTTP requests');
  metrics.push('# TYPE http_requests_total counter');

  for (const { method, path, status, count } of requestCounts.values()) {
    metrics.push(
      `http_requests_total{method="${escapeLabelValue(method)}",path="${escapeLabelValue(path)}",status="${status}"} ${count}`
    );
  }
  metrics.push('');

  // ============================================
  // HTTP Request Duration (Summary)
  // ============================================
  metrics.push('# HELP http_request_duration_seconds HTTP request duration in seconds');
  metrics.push('# TYPE http_request_duration_seconds summary');

  for (const { method, path, durations } of requestDurations.values()) {
    if (durations.length === 0) continue;

    const labels = `method="${escapeLabelValue(method)}",path="${escapeLabelValue(path)}"`;
    const sum = durations.reduce((a, b) => a + b, 0);
    const count = durations.length;
    const sorted = [...durations].sort((a, b) => a - b);

    for (const quantile of [0.5, 0.95, 0.99]) {
      const value = sorted[Math.floor(count * quantile)] ?? 0;
      metrics.push(`http_request_duration_seconds{${labels},quantile="${quantile}"} ${value.toFixed(4)}`);
    }
    metrics.push(`http_request_duration_seconds_sum{${labels}} ${sum.toFixed(4)}`);
    metrics.push(`http_request_duration_seconds_count{${labels}} ${count}`);
  }
  metrics.push('');

  return metrics;
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  requestCounts.clear();
  requestDurations.clear();
}
