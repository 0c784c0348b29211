import { CanvasSize } from '../entities/Media';
import { LayoutEntry, LayoutPlan } from '../entities/LayoutPlan';

/** Largest share of the canvas height the phrase band may occupy */
export const MAX_BAND_RATIO = 0.8;
export const DEFAULT_BAND_RATIO = 0.7;
/** Fade length used by slot timing */
export const SLOT_FADE_SECONDS = 1;

/**
 * Spreads the phrases evenly across a vertical band centred on the canvas.
 * Every phrase is visible for the whole duration, without fades.
 */
export function buildLayout(
    phrases: readonly string[],
    canvasHeight: number,
    durationSeconds: number,
    bandRatio: number = DEFAULT_BAND_RATIO
): LayoutPlan {
    if (phrases.length === 0) {
        throw new Error('Cannot lay out an empty phrase list');
    }
    if (!(bandRatio > 0 && bandRatio <= MAX_BAND_RATIO)) {
        throw new Error(`bandRatio must be in (0, ${MAX_BAND_RATIO}], got ${bandRatio}`);
    }
    if (!(durationSeconds > 0)) {
        throw new Error(`durationSeconds must be positive, got ${durationSeconds}`);
    }

    const band = canvasHeight * bandRatio;
    const top = (canvasHeight - band) / 2;
    const gap = band / (phrases.length + 1);

    const entries: LayoutEntry[] = phrases.map((text, i) => ({
        text,
        y: Math.round(top + gap * (i + 1)),
        startSeconds: 0,
        durationSeconds,
        fadeIn: false,
        fadeOut: false,
    }));

    return { entries, totalDurationSeconds: durationSeconds };
}

/**
 * One phrase at a time in the middle of the canvas, each owning a fixed slot.
 * All but the first fade in; all fade out.
 */
export function composeFixedSlot(
    phrases: readonly string[],
    slotSeconds: number,
    canvasHeight: number
): LayoutPlan {
    if (phrases.length === 0) {
        throw new Error('Cannot lay out an empty phrase list');
    }
    if (!(slotSeconds > 0)) {
        throw new Error(`slotSeconds must be positive, got ${slotSeconds}`);
    }

    const y = Math.round(canvasHeight / 2);
    const entries: LayoutEntry[] = phrases.map((text, i) => ({
        text,
        y,
        startSeconds: i * slotSeconds,
        durationSeconds: slotSeconds,
        fadeIn: i > 0,
        fadeOut: true,
    }));

    return { entries, totalDurationSeconds: slotSeconds * phrases.length };
}

export interface CoverCrop {
    /** Size the source is scaled to before cropping */
    scaledWidth: number;
    scaledHeight: number;
    /** Top-left corner of the crop window inside the scaled frame */
    x: number;
    y: number;
    width: number;
    height: number;
}

function evenAtLeast(value: number, minimum: number): number {
    let rounded = Math.ceil(value - 1e-6);
    if (rounded % 2 !== 0) {
        rounded += 1;
    }
    return Math.max(rounded, minimum);
}

/**
 * Scale-then-crop parameters that fill `target` with `source` (no letterboxing).
 */
export function computeCoverCrop(source: CanvasSize, target: CanvasSize): CoverCrop {
    if (source.width <= 0 || source.height <= 0) {
        throw new Error(`Invalid source size ${source.width}x${source.height}`);
    }

    const scale = Math.max(target.width / source.width, target.height / source.height);
    const scaledWidth = evenAtLeast(source.width * scale, target.width);
    const scaledHeight = evenAtLeast(source.height * scale, target.height);

    return {
        scaledWidth,
        scaledHeight,
        x: Math.floor((scaledWidth - target.width) / 2),
        y: Math.floor((scaledHeight - target.height) / 2),
        width: target.width,
        height: target.height,
    };
}

export function splitIntoSlides(phrases: readonly string[], perSlide: number): string[][] {
    if (!Number.isInteger(perSlide) || perSlide < 1) {
        throw new Error(`perSlide must be a positive integer, got ${perSlide}`);
    }

    const slides: string[][] = [];
    for (let i = 0; i < phrases.length; i += perSlide) {
        slides.push(phrases.slice(i, i + perSlide));
    }
    return slides;
}
