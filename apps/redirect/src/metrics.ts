/**
 * Metrics Module
 *
 * Lightweight instrumentation for redirect performance, exported in the
 * Prometheus text format.
 *
 * Design Decisions:
 * - In-memory counters (single-threaded, no locking)
 * - Histogram approximation using fixed buckets
 * - One instance per app, so tests start from zero
 */

import type { AccessRecorderStats } from "@snaplink/core";

/**
 * Histogram buckets for latency measurements (in milliseconds)
 */
const LATENCY_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000];

export type RedirectStatus = 302 | 404 | 503;

type CounterName = "redirect_302" | "redirect_404" | "redirect_503" | "cache_hit" | "cache_miss" | "store_error";

export interface MetricsSummary {
  totalRequests: number;
  cacheHitRate: number;
  avgLatencyMs: number;
  p99LatencyMs: number;
}

export class RedirectMetrics {
  private readonly counters: Record<CounterName, number> = {
    redirect_302: 0,
    redirect_404: 0,
    redirect_503: 0,
    cache_hit: 0,
    cache_miss: 0,
    store_error: 0,
  };

  private readonly buckets: number[] = Array.from({ length: LATENCY_BUCKETS.length + 1 }, () => 0);
  private latencySum = 0;
  private latencyCount = 0;

  increment(name: CounterName): void {
    this.counters[name]++;
  }

  recordLatency(latencyMs: number): void {
    this.latencySum += latencyMs;
    this.latencyCount++;

    const index = LATENCY_BUCKETS.findIndex((bound) => latencyMs <= bound);
    const bucket = index === -1 ? LATENCY_BUCKETS.length : index;
    this.buckets[bucket] = (this.buckets[bucket] ?? 0) + 1;
  }

  /**
   * @param cacheHit - only meaningful for 302s
   */
  recordRedirect(status: RedirectStatus, cacheHit: boolean, latencyMs: number): void {
    const counter: CounterName = `redirect_${status}`;
    this.increment(counter);

    if (status === 302) {
      this.increment(cacheHit ? "cache_hit" : "cache_miss");
    }
    if (status === 503) {
      this.increment("store_error");
    }

    this.recordLatency(latencyMs);
  }

  /**
   * Prometheus text. Background access stats are included when given.
   */
  render(access?: AccessRecorderStats): string {
    const lines: string[] = [];

    const addCounter = (name: string, value: number, help: string): void => {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      lines.push(`${name} ${value}`);
    };

    lines.push("# HELP snaplink_redirect_total Total redirects by status");
    lines.push("# TYPE snaplink_redirect_total counter");
    lines.push(`snaplink_redirect_total{status="302"} ${this.counters.redirect_302}`);
    lines.push(`snaplink_redirect_total{status="404"} ${this.counters.redirect_404}`);
    lines.push(`snaplink_redirect_total{status="503"} ${this.counters.redirect_503}`);

    addCounter("snaplink_cache_hit_total", this.counters.cache_hit, "Cache hits");
    addCounter("snaplink_cache_miss_total", this.counters.cache_miss, "Cache misses");
    addCounter("snaplink_store_error_total", this.counters.store_error, "Store failures on the redirect path");

    if (access) {
      lines.push("# HELP snaplink_access_tasks_total Background access tasks by outcome");
      lines.push("# TYPE snaplink_access_tasks_total counter");
      for (const outcome of ["completed", "failed", "timedOut", "dropped"] as const) {
        lines.push(`snaplink_access_tasks_total{outcome="${outcome}"} ${access[outcome]}`);
      }
      lines.push("# HELP snaplink_access_tasks_pending Background access tasks waiting");
      lines.push("# TYPE snaplink_access_tasks_pending gauge");
      lines.push(`snaplink_access_tasks_pending ${access.pending}`);
    }

    lines.push("# HELP snaplink_redirect_latency_ms Redirect latency in milliseconds");
    lines.push("# TYPE snaplink_redirect_latency_ms histogram");

    let cumulative = 0;
    LATENCY_BUCKETS.forEach((bound, i) => {
      cumulative += this.buckets[i] ?? 0;
      lines.push(`snaplink_redirect_latency_ms_bucket{le="${bound}"} ${cumulative}`);
    });
    cumulative += this.buckets[LATENCY_BUCKETS.length] ?? 0;
    lines.push(`snaplink_redirect_latency_ms_bucket{le="+Inf"} ${cumulative}`);
    lines.push(`snaplink_redirect_latency_ms_sum ${this.latencySum}`);
    lines.push(`snaplink_redirect_latency_ms_count ${this.latencyCount}`);

    return lines.join("\n");
  }

  summary(): MetricsSummary {
    const { redirect_302, redirect_404, redirect_503, cache_hit } = this.counters;
    return {
      totalRequests: redirect_302 + redirect_404 + redirect_503,
      cacheHitRate: redirect_302 > 0 ? cache_hit / redirect_302 : 0,
      avgLatencyMs: this.latencyCount > 0 ? this.latencySum / this.latencyCount : 0,
      p99LatencyMs: this.estimatePercentile(0.99),
    };
  }

  /**
   * Upper bound of the bucket holding the percentile.
   */
  private estimatePercentile(percentile: number): number {
    if (this.latencyCount === 0) return 0;

    const target = percentile * this.latencyCount;
    let cumulative = 0;
    for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
      cumulative += this.buckets[i] ?? 0;
      const bound = LATENCY_BUCKETS[i];
      if (cumulative >= target && bound !== undefined) return bound;
    }
    return LATENCY_BUCKETS[LATENCY_BUCKETS.length - 1] ?? 0;
  }
}
