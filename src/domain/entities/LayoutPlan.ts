/**
 * One text row of an overlay.
 * `y` is the vertical centre of the row; renderers shift the text up by
 * half of its rendered height so it sits centred on that line.
 */
export interface LayoutEntry {
    text: string;
    y: number;
    startSeconds: number;
    durationSeconds: number;
    fadeIn: boolean;
    fadeOut: boolean;
}

export interface LayoutPlan {
    entries: LayoutEntry[];
    totalDurationSeconds: number;
}

/**
 * How long the video runs and how rows are scheduled.
 * - fixed: all rows visible for a fixed number of seconds
 * - background: all rows visible for the length of the background clip
 * - audio: all rows visible for the length of the music track
 * - slots: one row at a time, `slotSeconds` each
 */
export type TimingMode =
    | { kind: 'fixed'; seconds: number }
    | { kind: 'background' }
    | { kind: 'audio' }
    | { kind: 'slots'; slotSeconds: number };

export function entryEndSeconds(entry: LayoutEntry): number {
    return entry.startSeconds + entry.durationSeconds;
}
