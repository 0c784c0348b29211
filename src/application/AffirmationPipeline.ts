import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { getVariant, listVariantNames, PipelineVariant } from '../config/variants';
import { AffirmationSet } from '../domain/entities/AffirmationSet';
import { RenderedImage, RenderedMedia } from '../domain/entities/Media';
import { Platform, publishFailed, PublishResult } from '../domain/entities/PublishResult';
import { errorMessage } from '../domain/errors';
import { IContentGenerator } from '../domain/ports/IContentGenerator';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { MediaComposer } from './MediaComposer';
import { FacebookPublisher } from './publishing/FacebookPublisher';
import { InstagramPublisher } from './publishing/InstagramPublisher';
import { StageTimer } from './StageTimer';

export interface PipelineSettings {
    assetsDir: string;
    /** Empty disables the copy of rendered media */
    outputDir: string;
    defaultVariant: string;
    /** Parent of the per-run workspaces; defaults to the OS temp dir */
    workspaceRoot?: string;
}

export interface PipelineDependencies {
    contentGenerator: IContentGenerator;
    composer: MediaComposer;
    facebookPublisher: FacebookPublisher;
    instagramPublisher: InstagramPublisher;
    metrics: IMetricsPort;
    stageTimer?: StageTimer;
    now?: () => Date;
}

export interface RunOptions {
    variant?: string;
    theme?: string;
}

export interface PipelineRunResult {
    variant: string;
    theme: string;
    affirmations: string[];
    caption: string;
    results: PublishResult[];
    facebookPosted: boolean;
    instagramPosted: boolean;
    /** Every targeted platform published */
    success: boolean;
}

type ComposedMedia =
    | { format: 'reel'; media: RenderedMedia }
    | { format: 'carousel'; images: RenderedImage[] };

const PLATFORM_ORDER: readonly Platform[] = ['facebook', 'instagram'];

export class UnknownVariantError extends Error {
    constructor(public readonly variant: string) {
        super(`Unknown pipeline variant "${variant}". Available: ${listVariantNames().join(', ')}`);
        this.name = 'UnknownVariantError';
    }
}

/**
 * One run: content, then composition, then publishing to each platform in turn.
 * The run's workspace is removed on every exit path.
 */
export class AffirmationPipeline {
    private readonly stageTimer: StageTimer;
    private readonly now: () => Date;

    constructor(
        private readonly deps: PipelineDependencies,
        private readonly settings: PipelineSettings
    ) {
        this.stageTimer = deps.stageTimer ?? new StageTimer(deps.metrics);
        this.now = deps.now ?? (() => new Date());
    }

    async run(options: RunOptions = {}): Promise<PipelineRunResult> {
        const variantName = options.variant ?? this.settings.defaultVariant;
        const variant = getVariant(variantName);
        if (!variant) {
            throw new UnknownVariantError(variantName);
        }

        const workspace = path.join(this.settings.workspaceRoot ?? path.join(os.tmpdir(), 'affirmation-poster'), uuidv4());
        await fs.promises.mkdir(workspace, { recursive: true });
        console.log(`[Pipeline] 🚀 Starting "${variant.name}" run in ${workspace}`);

        try {
            const content = await this.stageTimer.measure('content', () =>
                this.deps.contentGenerator.generate({
                    theme: options.theme,
                    themeStrategy: variant.themeStrategy,
                    phraseCount: variant.phraseCount,
                    maxPhraseLength: variant.maxPhraseLength,
                    caption: variant.caption,
                })
            );
            console.log(`[Pipeline] Theme: ${content.theme}`);
            content.phrases.forEach((phrase, i) => console.log(`[Pipeline]   ${i + 1}. ${phrase}`));

            const composed = await this.stageTimer.measure('compose', () => this.compose(variant, content, workspace));
            await this.copyToOutput(composed, content.theme);

            const results = await this.stageTimer.measure('publish', () => this.publish(variant, composed, content.caption));
            const result = this.summarize(variant, content, results);

            this.deps.metrics.incrementCounter(METRICS.RUNS_TOTAL, {
                variant: variant.name,
                outcome: result.success ? 'success' : 'failure',
            });
            if (result.success) {
                console.log(`[Pipeline] ✅ Posted to ${results.map(r => r.platform).join(' and ')}`);
            } else {
                const failed = results.filter(r => !r.success).map(r => r.platform);
                console.error(`[Pipeline] ❌ One or more platforms failed: ${failed.join(', ')}`);
            }
            return result;
        } catch (error) {
            this.deps.metrics.incrementCounter(METRICS.RUNS_TOTAL, { variant: variant.name, outcome: 'error' });
            throw error;
        } finally {
            await this.cleanup(workspace);
        }
    }

    private async compose(variant: PipelineVariant, content: AffirmationSet, workspace: string): Promise<ComposedMedia> {
        const textStyle = { ...variant.textStyle, fontFile: this.asset(variant.textStyle.fontFile) };

        if (variant.format === 'carousel') {
            const images = await this.deps.composer.composeCarousel({
                phrases: content.phrases,
                backgroundPath: this.asset(variant.background.file),
                phrasesPerSlide: variant.phrasesPerSlide,
                bandRatio: variant.bandRatio,
                textStyle,
            }, workspace);
            return { format: 'carousel', images };
        }

        const media = await this.deps.composer.composeVideo({
            phrases: content.phrases,
            background: { kind: variant.background.kind, path: this.asset(variant.background.file) },
            audio: variant.audio && { path: this.asset(variant.audio.file), volume: variant.audio.volume },
            timing: variant.timing,
            bandRatio: variant.bandRatio,
            textStyle,
        }, workspace);
        this.deps.metrics.recordHistogram(METRICS.MEDIA_DURATION, media.durationSeconds, { variant: variant.name });
        return { format: 'reel', media };
    }

    private async publish(variant: PipelineVariant, composed: ComposedMedia, caption: string): Promise<PublishResult[]> {
        const results: PublishResult[] = [];

        for (const platform of PLATFORM_ORDER.filter(p => variant.platforms.includes(p))) {
            if (platform === 'facebook') {
                results.push(composed.format === 'reel'
                    ? await this.deps.facebookPublisher.publishVideo(composed.media, caption)
                    : publishFailed('facebook', 'configuration', 'Facebook publishing supports videos only'));
            } else {
                results.push(composed.format === 'reel'
                    ? await this.deps.instagramPublisher.publishReel(composed.media, caption)
                    : await this.deps.instagramPublisher.publishCarousel(composed.images, caption));
            }
        }

        return results;
    }

    private summarize(variant: PipelineVariant, content: AffirmationSet, results: PublishResult[]): PipelineRunResult {
        const posted = (platform: Platform) => results.some(r => r.platform === platform && r.success);
        return {
            variant: variant.name,
            theme: content.theme,
            affirmations: [...content.phrases],
            caption: content.caption,
            results,
            facebookPosted: posted('facebook'),
            instagramPosted: posted('instagram'),
            success: results.length > 0 && results.every(r => r.success),
        };
    }

    private async copyToOutput(composed: ComposedMedia, theme: string): Promise<void> {
        if (!this.settings.outputDir) {
            return;
        }

        await fs.promises.mkdir(this.settings.outputDir, { recursive: true });
        const stem = `${theme.replace(/[^A-Za-z0-9-]+/g, '_')}_${formatDate(this.now())}`;

        if (composed.format === 'reel') {
            const target = path.join(this.settings.outputDir, `${stem}.mp4`);
            await fs.promises.copyFile(composed.media.path, target);
            console.log(`[Pipeline] Saved copy to ${target}`);
            return;
        }

        for (const [index, image] of composed.images.entries()) {
            const target = path.join(this.settings.outputDir, `${stem}_${index + 1}.jpg`);
            await fs.promises.copyFile(image.path, target);
            console.log(`[Pipeline] Saved copy to ${target}`);
        }
    }

    private async cleanup(workspace: string): Promise<void> {
        try {
            await fs.promises.rm(workspace, { recursive: true, force: true });
        } catch (error) {
            console.warn(`[Pipeline] Failed to clean up ${workspace}: ${errorMessage(error)}`);
        }
    }

    private asset(file: string): string {
        return path.resolve(this.settings.assetsDir, file);
    }
}

/**
 * YYYY-MM-DD in local time.
 */
export function formatDate(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
}
