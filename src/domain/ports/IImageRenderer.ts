import { CanvasSize, RenderedImage, TextStyle } from '../entities/Media';
import { LayoutEntry } from '../entities/LayoutPlan';

export interface TextCardJob {
    backgroundPath: string;
    canvas: CanvasSize;
    entries: readonly LayoutEntry[];
    textStyle: TextStyle;
    outputPath: string;
}

/**
 * IImageRenderer - Port for still-image work.
 * Implementations: SharpImageRenderer
 */
export interface IImageRenderer {
    /** Resizes (distorting if needed) to exactly `canvas` */
    resizeToFill(sourcePath: string, canvas: CanvasSize, outputPath: string): Promise<RenderedImage>;
    renderTextCard(job: TextCardJob): Promise<RenderedImage>;
}
