import { CanvasSize, MediaProbe, RenderedMedia, TextStyle } from '../entities/Media';
import { LayoutPlan } from '../entities/LayoutPlan';

export interface AudioTrack {
    path: string;
    /** Linear gain, 1 = unchanged */
    volume: number;
}

/**
 * Everything the renderer needs to produce one video.
 */
export interface VideoRenderJob {
    /** Still image (already at canvas size) or video background */
    background: { kind: 'image' | 'video'; path: string; size: CanvasSize };
    canvas: CanvasSize;
    layout: LayoutPlan;
    textStyle: TextStyle;
    /** Looped and trimmed to the layout duration */
    audio?: AudioTrack;
    outputPath: string;
}

/**
 * IMediaRenderer - Port for video composition and post-processing.
 * Implementations: FFmpegVideoRenderer
 */
export interface IMediaRenderer {
    probe(path: string): Promise<MediaProbe>;
    renderVideo(job: VideoRenderJob): Promise<RenderedMedia>;
    /** Holds the last frame (and pads audio) until `seconds` */
    extendDuration(media: RenderedMedia, seconds: number, outputPath: string): Promise<RenderedMedia>;
    addSilentAudio(media: RenderedMedia, outputPath: string): Promise<RenderedMedia>;
    /** Scales and crops to exactly `canvas` */
    conformCanvas(media: RenderedMedia, canvas: CanvasSize, outputPath: string): Promise<RenderedMedia>;
}
