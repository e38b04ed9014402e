/**
 * Metrics Controller
 *
 * Exposes application metrics in Prometheus text format
 * See: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { Request, Response } from 'express';
import { getHttpMetrics } from '@/api/middlewares/metricsMiddleware';
import { env } from '@/config/env';

const APP_VERSION = '1.0.0';

/**
 * Push a single-sample gauge or counter with its HELP/TYPE header
 */
function pushSample(
  metrics: string[],
  name: string,
  help: string,
  type: 'gauge' | 'counter',
  value: number
): void {
  metrics.push(`# HELP ${name} ${help}`);
  metrics.push(`# TYPE ${name} ${type}`);
  metrics.push(`${name} ${value}`);
  metrics.push('');
}

/**
 * GET /metrics
 *
 * - HTTP requests (total, latency) from metricsMiddleware
 * - Process uptime, memory and CPU
 * - Application info
 */
export function getMetrics(_req: Request, res: Response): void {
  const metrics: string[] = [...getHttpMetrics()];

  pushSample(metrics, 'process_uptime_seconds', 'Process uptime in seconds', 'gauge', process.uptime());

  const memUsage = process.memoryUsage();
  pushSample(metrics, 'process_heap_used_bytes', 'Process heap memory used in bytes', 'gauge', memUsage.heapUsed);
  pushSample(metrics, 'process_heap_total_bytes', 'Process heap memory total in bytes', 'gauge', memUsage.heapTotal);
  pushSample(metrics, 'process_rss_bytes', 'Process resident set size in bytes', 'gauge', memUsage.rss);

  // cpuUsage() reports microseconds
  const cpuUsage = process.cpuUsage();
  pushSample(metrics, 'process_cpu_user_seconds_total', 'Total user CPU time in seconds', 'counter', cpuUsage.user / 1_000_000);
  pushSample(metrics, 'process_cpu_system_seconds_total', 'Total system CPU time in seconds', 'counter', cpuUsage.system / 1_000_000);

  metrics.push('# HELP app_info Application information');
  metrics.push('# TYPE app_info gauge');
  metrics.push(`app_info{version="${APP_VERSION}",node_version="${process.version}",env="${env.NODE_ENV}"} 1`);
  metrics.push('');

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(metrics.join('\n'));
}
