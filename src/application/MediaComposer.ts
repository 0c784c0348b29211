import fs from 'fs';
import path from 'path';
import {
    BackgroundAsset,
    CanvasSize,
    CAROUSEL_CANVAS,
    matchesCanvas,
    MIN_REEL_SECONDS,
    REEL_CANVAS,
    RenderedImage,
    RenderedMedia,
    TextStyle,
} from '../domain/entities/Media';
import { LayoutPlan, TimingMode } from '../domain/entities/LayoutPlan';
import { MissingAssetError, RenderError } from '../domain/errors';
import { IImageRenderer } from '../domain/ports/IImageRenderer';
import { AudioTrack, IMediaRenderer } from '../domain/ports/IMediaRenderer';
import { buildLayout, composeFixedSlot, splitIntoSlides } from '../domain/services/LayoutCalculator';

export interface ReelComposeRequest {
    phrases: readonly string[];
    background: BackgroundAsset;
    audio?: AudioTrack;
    timing: TimingMode;
    bandRatio: number;
    /** fontFile must be an absolute or cwd-relative path */
    textStyle: TextStyle;
    canvas?: CanvasSize;
}

export interface CarouselComposeRequest {
    phrases: readonly string[];
    backgroundPath: string;
    phrasesPerSlide: number;
    bandRatio: number;
    textStyle: TextStyle;
    canvas?: CanvasSize;
}

/**
 * Turns phrases and assets into publishable media.
 * Layout arithmetic lives in LayoutCalculator; pixels are delegated to the renderers.
 * Rendered reels always leave here at least 3s long, with an audio track, at canvas size.
 */
export class MediaComposer {
    constructor(
        private readonly videoRenderer: IMediaRenderer,
        private readonly imageRenderer: IImageRenderer
    ) { }

    async composeVideo(request: ReelComposeRequest, workspace: string): Promise<RenderedMedia> {
        const canvas = request.canvas ?? REEL_CANVAS;

        await assertExists(request.background.path, `${request.background.kind} background`);
        if (request.audio) {
            await assertExists(request.audio.path, 'audio');
        }
        await assertExists(request.textStyle.fontFile, 'font');

        let backgroundPath = request.background.path;
        let backgroundSize: CanvasSize = canvas;
        let backgroundSeconds: number | undefined;

        if (request.background.kind === 'image') {
            const resized = await this.imageRenderer.resizeToFill(
                request.background.path,
                canvas,
                path.join(workspace, 'background.png')
            );
            backgroundPath = resized.path;
            backgroundSize = { width: resized.width, height: resized.height };
        } else {
            const probe = await this.videoRenderer.probe(request.background.path);
            if (probe.width <= 0 || probe.height <= 0) {
                throw new RenderError(`Could not read dimensions of ${request.background.path}`);
            }
            backgroundSize = { width: probe.width, height: probe.height };
            backgroundSeconds = probe.durationSeconds;
        }

        const duration = await this.resolveDuration(request, backgroundSeconds);
        const layout = this.planLayout(request, canvas, duration);
        console.log(`[Composer] ${layout.entries.length} phrases over ${layout.totalDurationSeconds.toFixed(2)}s (${request.timing.kind} timing)`);

        let media = await this.videoRenderer.renderVideo({
            background: { kind: request.background.kind, path: backgroundPath, size: backgroundSize },
            canvas,
            layout,
            textStyle: request.textStyle,
            audio: request.audio,
            outputPath: path.join(workspace, 'composite.mp4'),
        });

        if (media.durationSeconds < MIN_REEL_SECONDS) {
            console.warn(`[Composer] Video is ${media.durationSeconds.toFixed(2)}s, extending to ${MIN_REEL_SECONDS}s`);
            media = await this.videoRenderer.extendDuration(media, MIN_REEL_SECONDS, path.join(workspace, 'extended.mp4'));
        }
        if (!media.hasAudio) {
            console.warn('[Composer] Video has no audio track, adding silence');
            media = await this.videoRenderer.addSilentAudio(media, path.join(workspace, 'with_audio.mp4'));
        }
        if (!matchesCanvas(media, canvas)) {
            console.warn(`[Composer] Video is ${media.width}x${media.height}, conforming to ${canvas.width}x${canvas.height}`);
            media = await this.videoRenderer.conformCanvas(media, canvas, path.join(workspace, 'conformed.mp4'));
        }

        console.log(`[Composer] ✅ Reel ready: ${media.path}`);
        return media;
    }

    async composeCarousel(request: CarouselComposeRequest, workspace: string): Promise<RenderedImage[]> {
        const canvas = request.canvas ?? CAROUSEL_CANVAS;

        await assertExists(request.backgroundPath, 'image background');
        await assertExists(request.textStyle.fontFile, 'font');

        const slides = splitIntoSlides(request.phrases, request.phrasesPerSlide);
        const images: RenderedImage[] = [];

        for (const [index, slide] of slides.entries()) {
            // Stills have no timeline; any positive duration gives the same rows
            const layout = buildLayout(slide, canvas.height, 1, request.bandRatio);
            images.push(await this.imageRenderer.renderTextCard({
                backgroundPath: request.backgroundPath,
                canvas,
                entries: layout.entries,
                textStyle: request.textStyle,
                outputPath: path.join(workspace, `slide_${index + 1}.jpg`),
            }));
        }

        console.log(`[Composer] ✅ ${images.length} carousel slides ready`);
        return images;
    }

    private async resolveDuration(request: ReelComposeRequest, backgroundSeconds: number | undefined): Promise<number> {
        const timing = request.timing;
        let seconds = 0;

        switch (timing.kind) {
            case 'fixed':
                seconds = timing.seconds;
                break;
            case 'slots':
                seconds = timing.slotSeconds * request.phrases.length;
                break;
            case 'background':
                if (backgroundSeconds === undefined) {
                    throw new RenderError('Background timing needs a video background');
                }
                seconds = backgroundSeconds;
                break;
            case 'audio': {
                if (!request.audio) {
                    throw new RenderError('Audio timing needs an audio track');
                }
                const probe = await this.videoRenderer.probe(request.audio.path);
                seconds = probe.durationSeconds;
                break;
            }
        }

        if (!(seconds > 0)) {
            throw new RenderError(`Could not determine a positive video duration (${timing.kind} timing gave ${seconds})`);
        }
        return seconds;
    }

    private planLayout(request: ReelComposeRequest, canvas: CanvasSize, duration: number): LayoutPlan {
        if (request.timing.kind === 'slots') {
            return composeFixedSlot(request.phrases, request.timing.slotSeconds, canvas.height);
        }
        return buildLayout(request.phrases, canvas.height, duration, request.bandRatio);
    }
}

async function assertExists(filePath: string, kind: string): Promise<void> {
    try {
        await fs.promises.access(filePath, fs.constants.R_OK);
    } catch {
        throw new MissingAssetError(filePath, kind);
    }
}
