import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { RenderedImage, RenderedMedia } from '../../domain/entities/Media';
import { published, publishFailed, PublishFailureKind, PublishResult } from '../../domain/entities/PublishResult';
import { ConfigurationError, errorMessage } from '../../domain/errors';
import { ContainerParams, graphErrorMessage, IGraphApiClient } from '../../domain/ports/IGraphApiClient';
import { IMetricsPort, METRICS } from '../../domain/ports/IMetricsPort';
import { IStorageClient } from '../../domain/ports/IStorageClient';
import { ContainerPoller, PollOptions } from './ContainerPoller';

export interface InstagramSettings {
    pageId: string;
    accessToken: string;
    /** Looked up from the page when empty */
    accountId: string;
    bucket: string;
    reelPoll: PollOptions;
    carouselPoll: PollOptions;
}

export const MIN_CAROUSEL_ITEMS = 2;
export const MAX_CAROUSEL_ITEMS = 10;

/**
 * Stops a publish attempt with a classified failure.
 */
class PublishStepError extends Error {
    constructor(public readonly kind: PublishFailureKind, message: string) {
        super(message);
        this.name = 'PublishStepError';
    }
}

export function defaultStagingKey(localPath: string): string {
    return `${uuidv4()}-${path.basename(localPath)}`;
}

/**
 * Publishes through Instagram's container protocol:
 * stage the file, create a container, poll it to FINISHED, publish it.
 * Never throws; every outcome is a PublishResult.
 */
export class InstagramPublisher {
    constructor(
        private readonly graph: IGraphApiClient,
        private readonly storage: IStorageClient,
        private readonly poller: ContainerPoller,
        private readonly settings: InstagramSettings,
        private readonly metrics: IMetricsPort,
        private readonly stagingKey: (localPath: string) => string = defaultStagingKey
    ) { }

    async publishReel(media: RenderedMedia, caption: string): Promise<PublishResult> {
        console.log('[Instagram] === Starting Instagram Reel post ===');

        return this.record(async () => {
            const accountId = await this.resolveAccountId();
            const staged = await this.stage(media.path, 'video/mp4');

            const creationId = await this.createContainer(accountId, {
                media_type: 'REELS',
                video_url: staged,
                caption,
                share_to_feed: 'true',
            });
            console.log(`[Instagram] Created Reel container ${creationId}, waiting for processing...`);

            await this.waitForContainer(creationId, this.settings.reelPoll);
            return this.publishContainer(accountId, creationId);
        });
    }

    async publishCarousel(images: readonly RenderedImage[], caption: string): Promise<PublishResult> {
        console.log(`[Instagram] === Starting Instagram carousel post (${images.length} images) ===`);

        return this.record(async () => {
            if (images.length < MIN_CAROUSEL_ITEMS || images.length > MAX_CAROUSEL_ITEMS) {
                throw new PublishStepError(
                    'configuration',
                    `A carousel needs ${MIN_CAROUSEL_ITEMS}-${MAX_CAROUSEL_ITEMS} images, got ${images.length}`
                );
            }

            const accountId = await this.resolveAccountId();

            const imageUrls: string[] = [];
            for (const image of images) {
                imageUrls.push(await this.stage(image.path, 'image/jpeg'));
            }

            const childIds: string[] = [];
            for (const imageUrl of imageUrls) {
                const childId = await this.createContainer(accountId, {
                    media_type: 'IMAGE',
                    image_url: imageUrl,
                    is_carousel_item: 'true',
                });
                console.log(`[Instagram] Created carousel item ${childId}`);
                await this.waitForContainer(childId, this.settings.carouselPoll);
                childIds.push(childId);
            }

            const carouselId = await this.createContainer(accountId, {
                media_type: 'CAROUSEL',
                children: childIds.join(','),
                caption,
            });
            console.log(`[Instagram] Created carousel container ${carouselId}`);

            return this.publishContainer(accountId, carouselId);
        });
    }

    private async record(steps: () => Promise<string>): Promise<PublishResult> {
        let result: PublishResult;
        try {
            const postId = await steps();
            console.log(`[Instagram] ✅ Published, id ${postId}`);
            result = published('instagram', postId);
        } catch (error) {
            const kind = error instanceof PublishStepError ? error.kind : 'api';
            const message = error instanceof PublishStepError ? error.message : `Instagram request failed: ${errorMessage(error)}`;
            console.error(`[Instagram] ${message}`);
            result = publishFailed('instagram', kind, message);
        }

        this.metrics.incrementCounter(METRICS.PUBLISH_ATTEMPTS, {
            platform: 'instagram',
            outcome: result.success ? 'published' : result.failure,
        });
        return result;
    }

    private async resolveAccountId(): Promise<string> {
        if (!this.settings.accessToken) {
            throw new PublishStepError('configuration', 'FACEBOOK_ACCESS_TOKEN is not configured');
        }
        if (this.settings.accountId) {
            return this.settings.accountId;
        }
        if (!this.settings.pageId) {
            throw new PublishStepError('configuration', 'FACEBOOK_PAGE_ID is not configured');
        }

        const response = await this.graph.getInstagramAccountId(this.settings.pageId, this.settings.accessToken);
        if (response.status !== 200) {
            throw new PublishStepError('api', `Could not get Instagram account ID: ${graphErrorMessage(response)}`);
        }
        const accountId = response.data.instagram_business_account?.id;
        if (!accountId) {
            throw new PublishStepError('configuration', `Page ${this.settings.pageId} has no linked Instagram business account`);
        }

        console.log(`[Instagram] Using account ${accountId}`);
        return accountId;
    }

    private async stage(localPath: string, contentType: string): Promise<string> {
        try {
            const staged = await this.storage.put({
                localPath,
                bucket: this.settings.bucket,
                key: this.stagingKey(localPath),
                contentType,
                publicRead: true,
            });
            return staged.publicUrl;
        } catch (error) {
            const kind = error instanceof ConfigurationError ? 'configuration' : 'staging';
            throw new PublishStepError(kind, `Failed to stage ${localPath}: ${errorMessage(error)}`);
        }
    }

    private async createContainer(accountId: string, params: ContainerParams): Promise<string> {
        const response = await this.graph.createMediaContainer(accountId, this.settings.accessToken, params);
        if (response.status !== 200) {
            throw new PublishStepError('api', `Error creating media container: ${graphErrorMessage(response)}`);
        }
        if (!response.data.id) {
            throw new PublishStepError('api', 'No creation ID in container response');
        }
        return response.data.id;
    }

    private async waitForContainer(creationId: string, options: PollOptions): Promise<void> {
        const job = await this.poller.waitUntilFinished(creationId, this.settings.accessToken, options);
        if (job.status === 'ERROR') {
            throw new PublishStepError('processing_error', `Container ${creationId} failed processing: ${job.lastStatus ?? 'ERROR'}`);
        }
        if (job.status !== 'FINISHED') {
            throw new PublishStepError('timed_out', `Container ${creationId} not ready after ${job.attempts} status checks`);
        }
    }

    private async publishContainer(accountId: string, creationId: string): Promise<string> {
        const response = await this.graph.publishMediaContainer(accountId, this.settings.accessToken, creationId);
        if (response.status !== 200) {
            throw new PublishStepError('api', `Error publishing container: ${graphErrorMessage(response)}`);
        }
        if (!response.data.id) {
            throw new PublishStepError('api', 'No post ID in publish response');
        }
        return response.data.id;
    }
}
