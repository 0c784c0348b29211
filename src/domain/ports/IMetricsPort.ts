/**
 * Metrics Port Interface
 *
 * Contract for recording pipeline observability data.
 * Implementations: Console, Prometheus, NoOp.
 */

export interface MetricTags {
    [key: string]: string | number | boolean;
}

export interface IMetricsPort {
    /**
     * Increment a counter metric.
     * @param value - Increment amount (default: 1)
     */
    incrementCounter(name: string, tags?: MetricTags, value?: number): void;

    /**
     * Record a duration in milliseconds.
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void;

    /**
     * Record a gauge metric (current value at a point in time).
     */
    recordGauge(name: string, value: number, tags?: MetricTags): void;

    /**
     * Record a histogram observation.
     */
    recordHistogram(name: string, value: number, tags?: MetricTags): void;

    /**
     * Flush any buffered metrics (for batch sending implementations).
     */
    flush(): Promise<void>;
}

/**
 * Metric names used by the pipeline.
 */
export const METRICS = {
    // Counters
    RUNS_TOTAL: 'pipeline.runs_total',
    PUBLISH_ATTEMPTS: 'publish.attempts_total',
    CONTENT_FALLBACKS: 'content.fallbacks_total',
    CONTAINER_POLLS: 'instagram.container_polls_total',

    // Durations
    STAGE_DURATION: 'pipeline.stage_duration_ms',

    // Gauges
    STAGE_RSS_DELTA: 'pipeline.stage_rss_delta_bytes',

    // Histograms
    MEDIA_DURATION: 'media.duration_seconds',
} as const;

export type MetricName = typeof METRICS[keyof typeof METRICS];
