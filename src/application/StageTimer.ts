import { errorMessage } from '../domain/errors';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';

const MB = 1024 * 1024;

/**
 * Wraps a pipeline stage: measures wall time and resident memory before and
 * after, records both as metrics and logs them.
 */
export class StageTimer {
    constructor(
        private readonly metrics: IMetricsPort,
        private readonly now: () => number = Date.now,
        private readonly rss: () => number = () => process.memoryUsage().rss
    ) { }

    async measure<T>(stage: string, work: () => Promise<T>): Promise<T> {
        const startedAt = this.now();
        const rssBefore = this.rss();
        console.log(`[Stage] ▶ ${stage} (rss ${(rssBefore / MB).toFixed(1)} MB)`);

        let outcome: 'success' | 'failure' = 'failure';
        try {
            const result = await work();
            outcome = 'success';
            return result;
        } catch (error) {
            console.error(`[Stage] ${stage} failed: ${errorMessage(error)}`);
            throw error;
        } finally {
            const durationMs = this.now() - startedAt;
            const rssDelta = this.rss() - rssBefore;

            this.metrics.recordDuration(METRICS.STAGE_DURATION, durationMs, { stage, outcome });
            this.metrics.recordGauge(METRICS.STAGE_RSS_DELTA, rssDelta, { stage });
            console.log(`[Stage] ■ ${stage} ${outcome} in ${(durationMs / 1000).toFixed(2)}s (rss ${rssDelta >= 0 ? '+' : ''}${(rssDelta / MB).toFixed(1)} MB)`);
        }
    }
}
