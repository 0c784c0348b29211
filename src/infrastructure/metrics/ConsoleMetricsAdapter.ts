import { IMetricsPort, MetricTags } from '../../domain/ports/IMetricsPort';

type MetricKind = 'counter' | 'duration' | 'gauge' | 'histogram';

/**
 * Writes each observation as one `[Metrics] {...}` JSON line, for CLI runs
 * and deployments without a Prometheus scraper.
 */
export class ConsoleMetricsAdapter implements IMetricsPort {
    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        this.log('counter', name, value, tags);
    }

    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        this.log('duration', name, durationMs, tags);
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        this.log('gauge', name, value, tags);
    }

    recordHistogram(name: string, value: number, tags?: MetricTags): void {
        this.log('histogram', name, value, tags);
    }

    async flush(): Promise<void> {
        // Written immediately, nothing buffered
    }

    private log(type: MetricKind, name: string, value: number, tags?: MetricTags): void {
        console.log(`[Metrics] ${JSON.stringify({ type, name, value, tags: tags ?? {}, timestamp: new Date().toISOString() })}`);
    }
}

/**
 * Discards everything; selected by METRICS_BACKEND=none.
 */
export class NoOpMetricsAdapter implements IMetricsPort {
    incrementCounter(): void { }
    recordDuration(): void { }
    recordGauge(): void { }
    recordHistogram(): void { }
    async flush(): Promise<void> { }
}
