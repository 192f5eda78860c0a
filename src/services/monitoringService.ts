/**
 * In-memory request and error counters.
 *
 * Fed by the request logger and the error handler; reset on restart. The
 * admin metrics route reads a snapshot.
 */

let requestCount = 0;
let errorCount = 0;
let totalResponseTimeMs = 0;
let slowestResponseMs = 0;

function recordRequest(durationMs: number): void {
  requestCount++;
  totalResponseTimeMs += durationMs;
  slowestResponseMs = Math.max(slowestResponseMs, durationMs);
}

function recordError(): void {
  errorCount++;
}

export interface MetricsSnapshot {
  requestCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  slowestResponseMs: number;
  uptime: number;
}

function getMetrics(): MetricsSnapshot {
  const avgResponseTimeMs =
    requestCount > 0 ? Math.round((totalResponseTimeMs / requestCount) * 100) / 100 : 0;

  return {
    requestCount,
    errorCount,
    avgResponseTimeMs,
    slowestResponseMs,
    uptime: process.uptime(),
  };
}

/** Zero every counter (tests). */
function resetMetrics(): void {
  requestCount = 0;
  errorCount = 0;
  totalResponseTimeMs = 0;
  slowestResponseMs = 0;
}

export const monitoringService = {
  recordRequest,
  recordError,
  getMetrics,
  resetMetrics,
};
