import { ContainerPoller } from '../../../../src/application/publishing/ContainerPoller';
import { IGraphApiClient } from '../../../../src/domain/ports/IGraphApiClient';
import { IMetricsPort } from '../../../../src/domain/ports/IMetricsPort';

function createGraphMock(): jest.Mocked<IGraphApiClient> {
    return {
        getPageAccessToken: jest.fn(),
        getInstagramAccountId: jest.fn(),
        uploadPageVideo: jest.fn(),
        createMediaContainer: jest.fn(),
        getContainerStatus: jest.fn(),
        publishMediaContainer: jest.fn(),
    };
}

function createMetricsMock(): jest.Mocked<IMetricsPort> {
    return {
        incrementCounter: jest.fn(),
        recordDuration: jest.fn(),
        recordGauge: jest.fn(),
        recordHistogram: jest.fn(),
        flush: jest.fn().mockResolvedValue(undefined),
    };
}

describe('ContainerPoller', () => {
    let graph: jest.Mocked<IGraphApiClient>;
    let metrics: jest.Mocked<IMetricsPort>;
    let sleep: jest.Mock<Promise<void>, [number]>;
    let poller: ContainerPoller;

    beforeEach(() => {
        graph = createGraphMock();
        metrics = createMetricsMock();
        sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
        poller = new ContainerPoller(graph, metrics, sleep);
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('should stop as soon as the container is FINISHED', async () => {
        graph.getContainerStatus
            .mockResolvedValueOnce({ status: 200, data: { status_code: 'IN_PROGRESS' } })
            .mockResolvedValueOnce({ status: 200, data: { status_code: 'IN_PROGRESS' } })
            .mockResolvedValueOnce({ status: 200, data: { status_code: 'FINISHED', status: 'Finished: Media has been uploaded' } });

        const job = await poller.waitUntilFinished('c-1', 'user-token', { intervalMs: 10000, maxAttempts: 30 });

        expect(job).toEqual({
            creationId: 'c-1',
            status: 'FINISHED',
            attempts: 3,
            maxAttempts: 30,
            lastStatus: 'Finished: Media has been uploaded',
        });
        expect(graph.getContainerStatus).toHaveBeenCalledTimes(3);
        expect(graph.getContainerStatus).toHaveBeenCalledWith('c-1', 'user-token');
        expect(sleep.mock.calls).toEqual([[10000], [10000]]);
    });

    test('should not sleep before the first check', async () => {
        graph.getContainerStatus.mockResolvedValueOnce({ status: 200, data: { status_code: 'FINISHED' } });

        await poller.waitUntilFinished('c-1', 'user-token', { intervalMs: 5000, maxAttempts: 3 });

        expect(sleep).not.toHaveBeenCalled();
    });

    test('should stop on ERROR and keep the status text', async () => {
        graph.getContainerStatus.mockResolvedValueOnce({
            status: 200,
            data: { status_code: 'ERROR', status: 'Error: Unsupported video format' },
        });

        const job = await poller.waitUntilFinished('c-1', 'user-token', { intervalMs: 5000, maxAttempts: 3 });

        expect(job.status).toBe('ERROR');
        expect(job.lastStatus).toBe('Error: Unsupported video format');
        expect(job.attempts).toBe(1);
    });

    test('should time out after the attempt budget with one sleep between checks', async () => {
        graph.getContainerStatus.mockResolvedValue({ status: 200, data: { status_code: 'IN_PROGRESS' } });

        const job = await poller.waitUntilFinished('c-1', 'user-token', { intervalMs: 5000, maxAttempts: 3 });

        expect(job.status).toBe('TIMED_OUT');
        expect(graph.getContainerStatus).toHaveBeenCalledTimes(3);
        expect(sleep).toHaveBeenCalledTimes(2);
    });

    test('should count failed status requests as attempts', async () => {
        graph.getContainerStatus
            .mockRejectedValueOnce(new Error('socket hang up'))
            .mockResolvedValueOnce({ status: 500, data: { error: { message: 'Internal' } } })
            .mockResolvedValueOnce({ status: 200, data: { status_code: 'FINISHED' } });

        const job = await poller.waitUntilFinished('c-1', 'user-token', { intervalMs: 1, maxAttempts: 3 });

        expect(job.status).toBe('FINISHED');
        expect(job.attempts).toBe(3);
        expect(metrics.incrementCounter).toHaveBeenNthCalledWith(1, 'instagram.container_polls_total', { status: 'unknown' });
        expect(metrics.incrementCounter).toHaveBeenNthCalledWith(3, 'instagram.container_polls_total', { status: 'FINISHED' });
    });
});
