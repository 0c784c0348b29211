/**
 * Processing state of an Instagram media container.
 */
export type PublishJobStatus = 'PENDING' | 'IN_PROGRESS' | 'FINISHED' | 'ERROR' | 'TIMED_OUT';

/**
 * Tracks one container from creation until it is ready, rejected or abandoned.
 */
export interface PublishJob {
    creationId: string;
    status: PublishJobStatus;
    /** Status checks performed so far */
    attempts: number;
    maxAttempts: number;
    /** Raw `status` text from the last check, when the API sent one */
    lastStatus?: string;
}

export function createPublishJob(creationId: string, maxAttempts: number): PublishJob {
    if (!creationId.trim()) {
        throw new Error('PublishJob creationId cannot be empty');
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new Error(`PublishJob maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    return {
        creationId,
        status: 'PENDING',
        attempts: 0,
        maxAttempts,
    };
}

/**
 * Applies one status check to the job.
 * FINISHED and ERROR are terminal; any other code (or none) keeps the job
 * in progress until the attempt budget runs out.
 */
export function recordStatusCheck(job: PublishJob, statusCode?: string, statusText?: string): PublishJob {
    if (isPublishJobTerminal(job)) {
        throw new Error(`PublishJob ${job.creationId} is already ${job.status}`);
    }

    const attempts = job.attempts + 1;
    let status: PublishJobStatus;

    if (statusCode === 'FINISHED') {
        status = 'FINISHED';
    } else if (statusCode === 'ERROR') {
        status = 'ERROR';
    } else if (attempts >= job.maxAttempts) {
        status = 'TIMED_OUT';
    } else {
        status = 'IN_PROGRESS';
    }

    return {
        ...job,
        status,
        attempts,
        lastStatus: statusText ?? job.lastStatus,
    };
}

export function isPublishJobTerminal(job: PublishJob): boolean {
    return job.status === 'FINISHED' || job.status === 'ERROR' || job.status === 'TIMED_OUT';
}
