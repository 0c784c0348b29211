import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { IMetricsPort, METRICS, MetricName, MetricTags } from '../../domain/ports/IMetricsPort';

type MetricKind = 'counter' | 'gauge' | 'histogram';

interface MetricDefinition {
    kind: MetricKind;
    help: string;
    labelNames: string[];
    buckets?: number[];
}

/**
 * Every metric the pipeline records, registered up front so a scrape shows
 * them before the first run.
 */
export const METRIC_DEFINITIONS: Record<MetricName, MetricDefinition> = {
    [METRICS.RUNS_TOTAL]: {
        kind: 'counter',
        help: 'Pipeline runs by variant and outcome',
        labelNames: ['variant', 'outcome'],
    },
    [METRICS.PUBLISH_ATTEMPTS]: {
        kind: 'counter',
        help: 'Publish attempts by platform and outcome',
        labelNames: ['platform', 'outcome'],
    },
    [METRICS.CONTENT_FALLBACKS]: {
        kind: 'counter',
        help: 'Built-in content used because text generation failed',
        labelNames: ['step'],
    },
    [METRICS.CONTAINER_POLLS]: {
        kind: 'counter',
        help: 'Instagram container status checks by reported status',
        labelNames: ['status'],
    },
    [METRICS.STAGE_DURATION]: {
        kind: 'histogram',
        help: 'Wall time of each pipeline stage in milliseconds',
        labelNames: ['stage', 'outcome'],
        buckets: [100, 500, 1000, 5000, 15000, 60000, 180000, 600000],
    },
    [METRICS.STAGE_RSS_DELTA]: {
        kind: 'gauge',
        help: 'Resident memory change across the last run of each stage in bytes',
        labelNames: ['stage'],
    },
    [METRICS.MEDIA_DURATION]: {
        kind: 'histogram',
        help: 'Length of rendered Reels in seconds',
        labelNames: ['variant'],
        buckets: [3, 5, 10, 15, 30, 60, 90],
    },
};

type Registered =
    | { kind: 'counter'; metric: Counter<string> }
    | { kind: 'gauge'; metric: Gauge<string> }
    | { kind: 'histogram'; metric: Histogram<string> };

/**
 * Implements IMetricsPort with prom-client; scraped through GET /metrics.
 * Prometheus names cannot contain dots, so `pipeline.runs_total` is exposed
 * as `pipeline_runs_total`.
 */
export class PrometheusMetricsAdapter implements IMetricsPort {
    private readonly registry: Registry;
    private readonly metrics: Map<string, Registered> = new Map();

    constructor(prefix: string = 'affirmation_poster_', collectDefaults: boolean = true) {
        this.registry = new Registry();
        this.registry.setDefaultLabels({ app: 'affirmation-poster' });

        if (collectDefaults) {
            collectDefaultMetrics({ register: this.registry, prefix });
        }

        for (const [name, definition] of Object.entries(METRIC_DEFINITIONS)) {
            this.metrics.set(name, this.create(name, definition));
        }
    }

    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        const entry = this.lookup(name, 'counter');
        if (entry?.kind === 'counter') {
            entry.metric.inc(toLabels(tags), value);
        }
    }

    /**
     * Durations are observed on the histogram of the same name.
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        this.recordHistogram(name, durationMs, tags);
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        const entry = this.lookup(name, 'gauge');
        if (entry?.kind === 'gauge') {
            entry.metric.set(toLabels(tags), value);
        }
    }

    recordHistogram(name: string, value: number, tags?: MetricTags): void {
        const entry = this.lookup(name, 'histogram');
        if (entry?.kind === 'histogram') {
            entry.metric.observe(toLabels(tags), value);
        }
    }

    /**
     * Nothing to push: Prometheus pulls.
     */
    async flush(): Promise<void> {
        return Promise.resolve();
    }

    async getMetrics(): Promise<string> {
        return this.registry.metrics();
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    private create(name: string, definition: MetricDefinition): Registered {
        const config = {
            name: name.replace(/\./g, '_'),
            help: definition.help,
            labelNames: definition.labelNames,
            registers: [this.registry],
        };
        switch (definition.kind) {
            case 'counter':
                return { kind: 'counter', metric: new Counter(config) };
            case 'gauge':
                return { kind: 'gauge', metric: new Gauge(config) };
            case 'histogram':
                return { kind: 'histogram', metric: new Histogram({ ...config, buckets: definition.buckets }) };
        }
    }

    private lookup(name: string, kind: MetricKind): Registered | undefined {
        const entry = this.metrics.get(name);
        if (!entry || entry.kind !== kind) {
            console.warn(`[Metrics] Ignoring ${kind} ${name}: not a registered ${kind}`);
            return undefined;
        }
        return entry;
    }
}

function toLabels(tags?: MetricTags): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(tags ?? {})) {
        result[key] = String(value);
    }
    return result;
}
