import { FacebookPublisher, FacebookSettings } from '../../../../src/application/publishing/FacebookPublisher';
import { RenderedMedia } from '../../../../src/domain/entities/Media';
import { IGraphApiClient } from '../../../../src/domain/ports/IGraphApiClient';
import { IMetricsPort } from '../../../../src/domain/ports/IMetricsPort';

const reel: RenderedMedia = {
    path: '/work/composite.mp4',
    width: 1080,
    height: 1920,
    durationSeconds: 12,
    hasAudio: true,
};

describe('FacebookPublisher', () => {
    let graph: jest.Mocked<IGraphApiClient>;
    let metrics: jest.Mocked<IMetricsPort>;
    const settings: FacebookSettings = { pageId: 'page-1', accessToken: 'user-token' };

    beforeEach(() => {
        graph = {
            getPageAccessToken: jest.fn().mockResolvedValue({ status: 200, data: { access_token: 'page-token' } }),
            getInstagramAccountId: jest.fn(),
            uploadPageVideo: jest.fn().mockResolvedValue({ status: 200, data: { id: 'video-1' } }),
            createMediaContainer: jest.fn(),
            getContainerStatus: jest.fn(),
            publishMediaContainer: jest.fn(),
        };
        metrics = {
            incrementCounter: jest.fn(),
            recordDuration: jest.fn(),
            recordGauge: jest.fn(),
            recordHistogram: jest.fn(),
            flush: jest.fn().mockResolvedValue(undefined),
        };
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('should exchange the user token and upload with the page token', async () => {
        const result = await new FacebookPublisher(graph, settings, metrics).publishVideo(reel, 'Caption');

        expect(result).toEqual({ platform: 'facebook', success: true, postId: 'video-1' });
        expect(graph.getPageAccessToken).toHaveBeenCalledWith('page-1', 'user-token');
        expect(graph.uploadPageVideo).toHaveBeenCalledWith('page-1', 'page-token', '/work/composite.mp4', 'Caption');
        expect(metrics.incrementCounter).toHaveBeenCalledWith('publish.attempts_total', { platform: 'facebook', outcome: 'published' });
    });

    test.each([
        [{ pageId: '', accessToken: 'user-token' }, 'FACEBOOK_PAGE_ID is not configured'],
        [{ pageId: 'page-1', accessToken: '' }, 'FACEBOOK_ACCESS_TOKEN is not configured'],
    ])('should fail on missing configuration %#', async (partial, message) => {
        const result = await new FacebookPublisher(graph, partial, metrics).publishVideo(reel, 'Caption');

        expect(result).toEqual({ platform: 'facebook', success: false, failure: 'configuration', message });
        expect(graph.getPageAccessToken).not.toHaveBeenCalled();
    });

    test('should treat a rejected token exchange as configuration', async () => {
        graph.getPageAccessToken.mockResolvedValueOnce({ status: 400, data: { error: { message: 'Invalid OAuth access token.' } } });

        const result = await new FacebookPublisher(graph, settings, metrics).publishVideo(reel, 'Caption');

        expect(result).toMatchObject({ failure: 'configuration', message: 'Could not get page access token: Invalid OAuth access token.' });
        expect(graph.uploadPageVideo).not.toHaveBeenCalled();
    });

    test('should fail when no page token comes back', async () => {
        graph.getPageAccessToken.mockResolvedValueOnce({ status: 200, data: {} });

        const result = await new FacebookPublisher(graph, settings, metrics).publishVideo(reel, 'Caption');

        expect(result).toMatchObject({ failure: 'configuration', message: 'No page access token in response' });
    });

    test('should report a rejected upload as an api failure', async () => {
        graph.uploadPageVideo.mockResolvedValueOnce({ status: 413, data: {} });

        const result = await new FacebookPublisher(graph, settings, metrics).publishVideo(reel, 'Caption');

        expect(result).toMatchObject({ failure: 'api', message: 'Video upload returned HTTP 413: HTTP 413' });
        expect(metrics.incrementCounter).toHaveBeenCalledWith('publish.attempts_total', { platform: 'facebook', outcome: 'api' });
    });

    test('should report an upload response without an id', async () => {
        graph.uploadPageVideo.mockResolvedValueOnce({ status: 200, data: {} });

        const result = await new FacebookPublisher(graph, settings, metrics).publishVideo(reel, 'Caption');

        expect(result).toMatchObject({ failure: 'api', message: 'No post ID in upload response' });
    });

    test('should catch transport errors', async () => {
        graph.uploadPageVideo.mockRejectedValueOnce(new Error('timeout of 600000ms exceeded'));

        const result = await new FacebookPublisher(graph, settings, metrics).publishVideo(reel, 'Caption');

        expect(result).toMatchObject({ failure: 'api', message: 'Facebook request failed: timeout of 600000ms exceeded' });
    });
});
