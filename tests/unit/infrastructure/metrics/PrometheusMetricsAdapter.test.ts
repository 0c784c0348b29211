import { METRIC_DEFINITIONS, PrometheusMetricsAdapter } from '../../../../src/infrastructure/metrics/PrometheusMetricsAdapter';
import { METRICS } from '../../../../src/domain/ports/IMetricsPort';

describe('PrometheusMetricsAdapter', () => {
    let adapter: PrometheusMetricsAdapter;

    beforeEach(() => {
        adapter = new PrometheusMetricsAdapter('test_', false);
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('should define every pipeline metric', () => {
        expect(Object.keys(METRIC_DEFINITIONS).sort()).toEqual(Object.values(METRICS).sort());
    });

    test('should register pipeline metrics before anything is recorded', async () => {
        const output = await adapter.getMetrics();

        expect(output).toContain('# HELP pipeline_runs_total Pipeline runs by variant and outcome');
        expect(output).toContain('# TYPE pipeline_runs_total counter');
        expect(output).toContain('# TYPE instagram_container_polls_total counter');
        expect(output).toContain('# TYPE pipeline_stage_rss_delta_bytes gauge');
    });

    test('should expose counters with dots replaced by underscores', async () => {
        adapter.incrementCounter(METRICS.RUNS_TOTAL, { variant: 'sunset-overlay', outcome: 'success' });
        adapter.incrementCounter(METRICS.RUNS_TOTAL, { variant: 'sunset-overlay', outcome: 'success' });

        const output = await adapter.getMetrics();

        expect(output).toMatch(/pipeline_runs_total\{[^}]*outcome="success"[^}]*\} 2/);
        expect(output).toMatch(/pipeline_runs_total\{[^}]*app="affirmation-poster"[^}]*\} 2/);
    });

    test('should bucket stage durations in milliseconds', async () => {
        adapter.recordDuration(METRICS.STAGE_DURATION, 250, { stage: 'compose', outcome: 'success' });

        const output = await adapter.getMetrics();

        expect(output).toContain('# TYPE pipeline_stage_duration_ms histogram');
        expect(output).toMatch(/pipeline_stage_duration_ms_bucket\{(?=[^}]*le="100")(?=[^}]*stage="compose")[^}]*\} 0\n/);
        expect(output).toMatch(/pipeline_stage_duration_ms_bucket\{(?=[^}]*le="500")(?=[^}]*stage="compose")[^}]*\} 1\n/);
        expect(output).toMatch(/pipeline_stage_duration_ms_sum\{[^}]*stage="compose"[^}]*\} 250/);
    });

    test('should bucket Reel lengths in seconds', async () => {
        adapter.recordHistogram(METRICS.MEDIA_DURATION, 12, { variant: 'dark-sunset-12s' });

        const output = await adapter.getMetrics();

        expect(output).toMatch(/media_duration_seconds_bucket\{(?=[^}]*le="10")[^}]*\} 0\n/);
        expect(output).toMatch(/media_duration_seconds_bucket\{(?=[^}]*le="15")[^}]*\} 1\n/);
    });

    test('should set gauges', async () => {
        adapter.recordGauge(METRICS.STAGE_RSS_DELTA, 1024, { stage: 'content' });

        const output = await adapter.getMetrics();

        expect(output).toMatch(/pipeline_stage_rss_delta_bytes\{[^}]*stage="content"[^}]*\} 1024/);
    });

    test('should ignore names it does not know and warn', async () => {
        adapter.incrementCounter('uploads.total');
        adapter.recordGauge(METRICS.RUNS_TOTAL, 3);

        const output = await adapter.getMetrics();

        expect(output).not.toContain('uploads_total');
        expect(console.warn).toHaveBeenCalledWith('[Metrics] Ignoring counter uploads.total: not a registered counter');
        expect(console.warn).toHaveBeenCalledWith('[Metrics] Ignoring gauge pipeline.runs_total: not a registered gauge');
    });

    test('should not register default process metrics when disabled', async () => {
        const output = await adapter.getMetrics();

        expect(output).not.toContain('test_process_cpu');
    });

    test('should report the Prometheus text content type', () => {
        expect(adapter.contentType).toContain('text/plain');
    });
});
