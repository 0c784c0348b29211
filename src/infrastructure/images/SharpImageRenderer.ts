import fs from 'fs';
import sharp from 'sharp';
import { CanvasSize, RenderedImage, TextStyle } from '../../domain/entities/Media';
import { LayoutEntry } from '../../domain/entities/LayoutPlan';
import { errorMessage, RenderError } from '../../domain/errors';
import { IImageRenderer, TextCardJob } from '../../domain/ports/IImageRenderer';

const JPEG_QUALITY = 95;

/** Pango sizes are in points; at 72 dpi one point is one pixel. */
const TEXT_DPI = 72;

export function escapeMarkup(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/**
 * sharp text input for one row, drawn with the style's font file.
 */
export function textRowInput(
    text: string,
    style: TextStyle,
    color: string = style.color,
    wrapWidth?: number
): sharp.CreateText {
    return {
        text: `<span foreground="${escapeMarkup(color)}">${escapeMarkup(text)}</span>`,
        font: `${style.fontFamily} ${style.fontSize}`,
        fontfile: style.fontFile,
        dpi: TEXT_DPI,
        rgba: true,
        ...(wrapWidth !== undefined && { width: wrapWidth, align: 'centre' as const }),
    };
}

/**
 * Top-left corner that centres a rendered row horizontally and on `centreY`,
 * shifted by `offset` and kept inside the canvas.
 */
export function rowPosition(
    row: { width: number; height: number },
    centreY: number,
    canvas: CanvasSize,
    offset: { dx: number; dy: number } = { dx: 0, dy: 0 }
): { top: number; left: number } {
    const left = Math.round((canvas.width - row.width) / 2) + offset.dx;
    const top = Math.round(centreY - row.height / 2) + offset.dy;
    return {
        left: Math.max(0, Math.min(left, canvas.width - row.width)),
        top: Math.max(0, Math.min(top, canvas.height - row.height)),
    };
}

/**
 * Offsets of the outline copies drawn under a row: the eight neighbours at `width` pixels.
 */
export function strokeOffsets(width: number): Array<{ dx: number; dy: number }> {
    const d = Math.max(1, Math.round(width));
    const offsets: Array<{ dx: number; dy: number }> = [];
    for (const dy of [-d, 0, d]) {
        for (const dx of [-d, 0, d]) {
            if (dx !== 0 || dy !== 0) offsets.push({ dx, dy });
        }
    }
    return offsets;
}

/**
 * Still-image work on sharp: background resizing and carousel text cards.
 */
export class SharpImageRenderer implements IImageRenderer {
    async resizeToFill(sourcePath: string, canvas: CanvasSize, outputPath: string): Promise<RenderedImage> {
        console.log(`[Sharp] Resizing ${sourcePath} to ${canvas.width}x${canvas.height}`);
        try {
            const info = await sharp(sourcePath)
                .resize({ width: canvas.width, height: canvas.height, fit: 'fill', kernel: 'lanczos3' })
                .toFile(outputPath);
            return { path: outputPath, width: info.width, height: info.height };
        } catch (error) {
            throw new RenderError(`Failed to resize ${sourcePath}: ${errorMessage(error)}`);
        }
    }

    async renderTextCard(job: TextCardJob): Promise<RenderedImage> {
        console.log(`[Sharp] Rendering ${job.entries.length}-row card -> ${job.outputPath}`);

        try {
            await fs.promises.access(job.textStyle.fontFile, fs.constants.R_OK);
        } catch {
            throw new RenderError(`Font file not readable: ${job.textStyle.fontFile}`);
        }

        try {
            const background = await sharp(job.backgroundPath)
                .resize({ width: job.canvas.width, height: job.canvas.height, fit: 'fill', kernel: 'lanczos3' })
                .toBuffer();

            const layers: sharp.OverlayOptions[] = [];
            for (const entry of job.entries) {
                layers.push(...await this.rowLayers(entry, job.canvas, job.textStyle));
            }

            const info = await sharp(background)
                .composite(layers)
                .jpeg({ quality: JPEG_QUALITY })
                .toFile(job.outputPath);

            return { path: job.outputPath, width: info.width, height: info.height };
        } catch (error) {
            throw new RenderError(`Failed to render text card ${job.outputPath}: ${errorMessage(error)}`);
        }
    }

    private async rowLayers(entry: LayoutEntry, canvas: CanvasSize, style: TextStyle): Promise<sharp.OverlayOptions[]> {
        const text = await this.renderRow(entry.text, style, style.color, canvas.width);
        const layers: sharp.OverlayOptions[] = [];

        if (style.strokeWidth && style.strokeColor) {
            const outline = await this.renderRow(entry.text, style, style.strokeColor, canvas.width);
            for (const offset of strokeOffsets(style.strokeWidth)) {
                layers.push({ input: outline.data, ...rowPosition(outline.info, entry.y, canvas, offset) });
            }
        }

        layers.push({ input: text.data, ...rowPosition(text.info, entry.y, canvas) });
        return layers;
    }

    private async renderRow(
        text: string,
        style: TextStyle,
        color: string,
        wrapWidth: number
    ): Promise<{ data: Buffer; info: sharp.OutputInfo }> {
        return sharp({ text: textRowInput(text, style, color, wrapWidth) })
            .png()
            .toBuffer({ resolveWithObject: true });
    }
}
