/**
 * In-memory monitoring service.
 *
 * Tracks basic application metrics that accumulate in memory and reset on
 * restart. Called from the request middleware, the rate limiter and the image
 * service without adding external dependencies.
 *
 * Exposed counters:
 *   - requestCount: total HTTP requests handled
 *   - errorCount: total errors processed by the error handler
 *   - totalResponseTimeMs: cumulative response time for average calculation
 *   - rateLimitedCount: requests rejected by the admission gate
 *   - upstreamFailureCount: provider calls that failed (including partial slots)
 *   - imagesGenerated: images returned to clients
 *   - persistenceFailureCount: images that could not be written to disk
 */

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

let requestCount = 0;
let errorCount = 0;
let totalResponseTimeMs = 0;
let rateLimitedCount = 0;
let upstreamFailureCount = 0;
let imagesGenerated = 0;
let persistenceFailureCount = 0;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Record a completed request with its response time.
 */
function recordRequest(durationMs: number): void {
  requestCount++;
  totalResponseTimeMs += durationMs;
}

/**
 * Record an error processed by the error handler.
 */
function recordError(): void {
  errorCount++;
}

function recordRateLimited(): void {
  rateLimitedCount++;
}

function recordUpstreamFailure(count = 1): void {
  upstreamFailureCount += count;
}

function recordImagesGenerated(count: number): void {
  imagesGenerated += count;
}

function recordPersistenceFailure(): void {
  persistenceFailureCount++;
}

interface Metrics {
  requestCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  rateLimitedCount: number;
  upstreamFailureCount: number;
  imagesGenerated: number;
  persistenceFailureCount: number;
  uptime: number;
}

/**
 * Get a snapshot of all current metrics.
 */
function getMetrics(): Metrics {
  const avgResponseTimeMs =
    requestCount > 0
      ? Math.round((totalResponseTimeMs / requestCount) * 100) / 100
      : 0;

  return {
    requestCount,
    errorCount,
    avgResponseTimeMs,
    rateLimitedCount,
    upstreamFailureCount,
    imagesGenerated,
    persistenceFailureCount,
    uptime: process.uptime(),
  };
}

/**
 * Reset all metrics to initial values (useful for testing).
 */
function resetMetrics(): void {
  requestCount = 0;
  errorCount = 0;
  totalResponseTimeMs = 0;
  rateLimitedCount = 0;
  upstreamFailureCount = 0;
  imagesGenerated = 0;
  persistenceFailureCount = 0;
}

export const monitoringService = {
  recordRequest,
  recordError,
  recordRateLimited,
  recordUpstreamFailure,
  recordImagesGenerated,
  recordPersistenceFailure,
  getMetrics,
  resetMetrics,
};

export type { Metrics };
