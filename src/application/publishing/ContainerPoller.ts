import { createPublishJob, isPublishJobTerminal, PublishJob, recordStatusCheck } from '../../domain/entities/PublishJob';
import { errorMessage } from '../../domain/errors';
import { IGraphApiClient } from '../../domain/ports/IGraphApiClient';
import { IMetricsPort, METRICS } from '../../domain/ports/IMetricsPort';

export interface PollOptions {
    intervalMs: number;
    maxAttempts: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Polls an Instagram media container until it is FINISHED, ERROR, or the
 * attempt budget is spent. Every status request counts as one attempt,
 * including ones that fail; the wait happens between attempts only.
 */
export class ContainerPoller {
    constructor(
        private readonly graph: IGraphApiClient,
        private readonly metrics: IMetricsPort,
        private readonly sleep: Sleep = defaultSleep
    ) { }

    async waitUntilFinished(creationId: string, accessToken: string, options: PollOptions): Promise<PublishJob> {
        let job = createPublishJob(creationId, options.maxAttempts);

        while (!isPublishJobTerminal(job)) {
            if (job.attempts > 0) {
                await this.sleep(options.intervalMs);
            }

            let statusCode: string | undefined;
            let statusText: string | undefined;
            try {
                const response = await this.graph.getContainerStatus(creationId, accessToken);
                if (response.status === 200) {
                    statusCode = response.data?.status_code;
                    statusText = response.data?.status;
                } else {
                    console.warn(`[Instagram] Status check for ${creationId} returned HTTP ${response.status}`);
                }
            } catch (error) {
                console.warn(`[Instagram] Status check for ${creationId} failed: ${errorMessage(error)}`);
            }

            job = recordStatusCheck(job, statusCode, statusText);
            this.metrics.incrementCounter(METRICS.CONTAINER_POLLS, { status: statusCode ?? 'unknown' });
            console.log(`[Instagram] Container ${creationId} attempt ${job.attempts}/${job.maxAttempts}: ${statusCode ?? 'no status'}`);
        }

        if (job.status === 'FINISHED') {
            console.log(`[Instagram] ✅ Container ${creationId} ready after ${job.attempts} checks`);
        } else if (job.status === 'ERROR') {
            console.error(`[Instagram] Container ${creationId} failed processing: ${job.lastStatus ?? 'no detail'}`);
        } else {
            console.error(`[Instagram] Container ${creationId} not ready after ${job.attempts} checks`);
        }

        return job;
    }
}
