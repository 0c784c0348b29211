import { CanvasSize, TextStyle } from '../../domain/entities/Media';
import { entryEndSeconds, LayoutEntry } from '../../domain/entities/LayoutPlan';
import { computeCoverCrop, SLOT_FADE_SECONDS } from '../../domain/services/LayoutCalculator';
import { VideoRenderJob } from '../../domain/ports/IMediaRenderer';

/** Instagram Reels upload limit */
export const MAX_REEL_BYTES = 100 * 1024 * 1024;

/**
 * Encoder settings Instagram accepts for Reels without re-processing.
 */
export const REELS_OUTPUT_OPTIONS: readonly string[] = [
    '-c:v libx264',
    '-preset medium',
    '-profile:v main',
    '-level 4.0',
    '-b:v 4M',
    '-maxrate 5M',
    '-bufsize 5M',
    '-r 30',
    '-fps_mode cfr',
    '-pix_fmt yuv420p',
    '-c:a aac',
    '-b:a 128k',
    '-ar 44100',
    '-ac 2',
    '-movflags +faststart',
];

export function formatSeconds(value: number): string {
    return Number(value.toFixed(3)).toString();
}

/**
 * Escapes a file path for use as a drawtext option value.
 */
export function escapeFilterPath(filePath: string): string {
    return filePath
        .replace(/\\/g, '/')
        .replace(/:/g, '\\:')
        .replace(/'/g, "\\'");
}

/**
 * Opacity over time for one row: linear ramps of SLOT_FADE_SECONDS at the
 * edges that are faded, 1 elsewhere.
 */
export function alphaExpression(entry: LayoutEntry): string {
    const start = formatSeconds(entry.startSeconds);
    const end = formatSeconds(entryEndSeconds(entry));
    const fade = formatSeconds(SLOT_FADE_SECONDS);
    const fadeIn = `if(lt(t,${start}+${fade}),(t-${start})/${fade},1)`;
    const fadeOut = `if(gt(t,${end}-${fade}),(${end}-t)/${fade},1)`;

    if (entry.fadeIn && entry.fadeOut) {
        return `if(lt(t,${start}+${fade}),(t-${start})/${fade},${fadeOut})`;
    }
    if (entry.fadeIn) return fadeIn;
    if (entry.fadeOut) return fadeOut;
    return '1';
}

/**
 * drawtext reading its text from a file so quotes and colons need no escaping.
 */
export function drawtextFilter(entry: LayoutEntry, textFile: string, style: TextStyle): string {
    const options = [
        `fontfile='${escapeFilterPath(style.fontFile)}'`,
        `textfile='${escapeFilterPath(textFile)}'`,
        'expansion=none',
        `fontsize=${style.fontSize}`,
        `fontcolor=${style.color}`,
        'x=(w-text_w)/2',
        `y=${entry.y}-text_h/2`,
        `enable='between(t,${formatSeconds(entry.startSeconds)},${formatSeconds(entryEndSeconds(entry))})'`,
    ];

    const alpha = alphaExpression(entry);
    if (alpha !== '1') {
        options.push(`alpha='${alpha}'`);
    }
    if (style.strokeWidth && style.strokeColor) {
        options.push(`borderw=${Math.max(1, Math.round(style.strokeWidth))}`, `bordercolor=${style.strokeColor}`);
    }

    return `drawtext=${options.join(':')}`;
}

/**
 * Scale-then-crop chain that fills `target`; empty when the source already matches.
 */
export function coverFilter(source: CanvasSize, target: CanvasSize): string[] {
    if (source.width === target.width && source.height === target.height) {
        return [];
    }
    const crop = computeCoverCrop(source, target);
    return [
        `scale=${crop.scaledWidth}:${crop.scaledHeight}`,
        `crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`,
    ];
}

export interface RenderGraph {
    filters: string[];
    outputs: string[];
}

/**
 * Filter graph for one render. Input 0 is the background, input 1 the music when present.
 * `textFiles[i]` holds the text of `job.layout.entries[i]`.
 */
export function buildRenderGraph(job: VideoRenderJob, textFiles: readonly string[]): RenderGraph {
    const duration = formatSeconds(job.layout.totalDurationSeconds);
    const video = [
        ...coverFilter(job.background.size, job.canvas),
        'setsar=1',
        ...job.layout.entries.map((entry, i) => drawtextFilter(entry, textFiles[i], job.textStyle)),
        'format=yuv420p',
    ];

    const filters = [`[0:v]${video.join(',')}[vout]`];
    const outputs = ['vout'];

    if (job.audio) {
        filters.push(`[1:a]volume=${job.audio.volume},atrim=0:${duration},asetpts=PTS-STARTPTS[aout]`);
        outputs.push('aout');
    }

    return { filters, outputs };
}
