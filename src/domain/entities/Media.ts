/**
 * Output frame size in pixels.
 */
export interface CanvasSize {
    width: number;
    height: number;
}

/** 9:16 Reel frame */
export const REEL_CANVAS: CanvasSize = { width: 1080, height: 1920 };

/** 4:5 feed/carousel frame */
export const CAROUSEL_CANVAS: CanvasSize = { width: 1080, height: 1350 };

/** Instagram rejects Reels shorter than this. */
export const MIN_REEL_SECONDS = 3;

export type BackgroundKind = 'image' | 'video';

export interface BackgroundAsset {
    kind: BackgroundKind;
    path: string;
}

/**
 * A rendered video file on local disk.
 */
export interface RenderedMedia {
    path: string;
    width: number;
    height: number;
    durationSeconds: number;
    hasAudio: boolean;
}

/**
 * A rendered still image on local disk.
 */
export interface RenderedImage {
    path: string;
    width: number;
    height: number;
}

/**
 * Facts read back from a media file.
 */
export interface MediaProbe {
    width: number;
    height: number;
    durationSeconds: number;
    hasAudio: boolean;
}

/**
 * How overlay text is drawn.
 */
export interface TextStyle {
    /** TTF/OTF file every renderer draws text with */
    fontFile: string;
    /** Family name of the face inside fontFile */
    fontFamily: string;
    fontSize: number;
    color: string;
    /** Optional outline width in pixels */
    strokeWidth?: number;
    strokeColor?: string;
}

export function matchesCanvas(size: { width: number; height: number }, canvas: CanvasSize): boolean {
    return size.width === canvas.width && size.height === canvas.height;
}
