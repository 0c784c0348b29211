import {
    createPublishJob,
    isPublishJobTerminal,
    recordStatusCheck,
} from '../../../../src/domain/entities/PublishJob';

describe('PublishJob', () => {
    test('should start pending with no attempts', () => {
        const job = createPublishJob('container-1', 3);

        expect(job).toEqual({ creationId: 'container-1', status: 'PENDING', attempts: 0, maxAttempts: 3 });
        expect(isPublishJobTerminal(job)).toBe(false);
    });

    test('should reject an empty creation id', () => {
        expect(() => createPublishJob('  ', 3)).toThrow('PublishJob creationId cannot be empty');
    });

    test('should reject a non-positive attempt budget', () => {
        expect(() => createPublishJob('c', 0)).toThrow('PublishJob maxAttempts must be a positive integer, got 0');
    });

    test('should stay in progress on unknown or missing status codes', () => {
        let job = createPublishJob('c', 5);
        job = recordStatusCheck(job, 'IN_PROGRESS', 'Processing');
        job = recordStatusCheck(job);

        expect(job.status).toBe('IN_PROGRESS');
        expect(job.attempts).toBe(2);
        expect(job.lastStatus).toBe('Processing');
    });

    test('should finish on FINISHED', () => {
        const job = recordStatusCheck(createPublishJob('c', 5), 'FINISHED');

        expect(job.status).toBe('FINISHED');
        expect(isPublishJobTerminal(job)).toBe(true);
    });

    test('should fail on ERROR even on the last attempt', () => {
        const job = recordStatusCheck(createPublishJob('c', 1), 'ERROR', 'Error: unsupported codec');

        expect(job.status).toBe('ERROR');
        expect(job.lastStatus).toBe('Error: unsupported codec');
    });

    test('should time out once the budget is spent', () => {
        let job = createPublishJob('c', 2);
        job = recordStatusCheck(job, 'IN_PROGRESS');
        job = recordStatusCheck(job, 'IN_PROGRESS');

        expect(job.status).toBe('TIMED_OUT');
        expect(job.attempts).toBe(2);
    });

    test('should refuse checks after a terminal state', () => {
        const job = recordStatusCheck(createPublishJob('c', 3), 'FINISHED');

        expect(() => recordStatusCheck(job, 'IN_PROGRESS')).toThrow('PublishJob c is already FINISHED');
    });
});
