import { RenderedMedia } from '../../domain/entities/Media';
import { published, publishFailed, PublishFailureKind, PublishResult } from '../../domain/entities/PublishResult';
import { errorMessage } from '../../domain/errors';
import { graphErrorMessage, IGraphApiClient } from '../../domain/ports/IGraphApiClient';
import { IMetricsPort, METRICS } from '../../domain/ports/IMetricsPort';

export interface FacebookSettings {
    pageId: string;
    /** User token; exchanged for the page token on every publish */
    accessToken: string;
}

/**
 * Posts a rendered video to a Facebook page in one multipart upload.
 * Never throws; every outcome is a PublishResult.
 */
export class FacebookPublisher {
    constructor(
        private readonly graph: IGraphApiClient,
        private readonly settings: FacebookSettings,
        private readonly metrics: IMetricsPort
    ) { }

    async publishVideo(media: RenderedMedia, caption: string): Promise<PublishResult> {
        const result = await this.attempt(media, caption);
        this.metrics.incrementCounter(METRICS.PUBLISH_ATTEMPTS, {
            platform: 'facebook',
            outcome: result.success ? 'published' : result.failure,
        });
        return result;
    }

    private async attempt(media: RenderedMedia, caption: string): Promise<PublishResult> {
        console.log('[Facebook] === Starting Facebook post ===');

        if (!this.settings.pageId) {
            return this.fail('configuration', 'FACEBOOK_PAGE_ID is not configured');
        }
        if (!this.settings.accessToken) {
            return this.fail('configuration', 'FACEBOOK_ACCESS_TOKEN is not configured');
        }

        try {
            console.log('[Facebook] Getting page access token...');
            const tokenResponse = await this.graph.getPageAccessToken(this.settings.pageId, this.settings.accessToken);
            if (tokenResponse.status !== 200) {
                return this.fail('configuration', `Could not get page access token: ${graphErrorMessage(tokenResponse)}`);
            }
            const pageToken = tokenResponse.data.access_token;
            if (!pageToken) {
                return this.fail('configuration', 'No page access token in response');
            }

            console.log(`[Facebook] Uploading ${media.path}...`);
            const uploadResponse = await this.graph.uploadPageVideo(this.settings.pageId, pageToken, media.path, caption);
            if (uploadResponse.status !== 200) {
                return this.fail('api', `Video upload returned HTTP ${uploadResponse.status}: ${graphErrorMessage(uploadResponse)}`);
            }
            const postId = uploadResponse.data.id;
            if (!postId) {
                return this.fail('api', 'No post ID in upload response');
            }

            console.log(`[Facebook] ✅ Posted video, id ${postId}`);
            return published('facebook', postId);
        } catch (error) {
            return this.fail('api', `Facebook request failed: ${errorMessage(error)}`);
        }
    }

    private fail(kind: PublishFailureKind, message: string): PublishResult {
        console.error(`[Facebook] ${message}`);
        return publishFailed('facebook', kind, message);
    }
}
