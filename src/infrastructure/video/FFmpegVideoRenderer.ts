import ffmpeg, { FfmpegCommand, FfprobeData } from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { CanvasSize, MediaProbe, RenderedMedia } from '../../domain/entities/Media';
import { RenderError } from '../../domain/errors';
import { IMediaRenderer, VideoRenderJob } from '../../domain/ports/IMediaRenderer';
import {
    buildRenderGraph,
    coverFilter,
    formatSeconds,
    MAX_REEL_BYTES,
    REELS_OUTPUT_OPTIONS,
} from './FfmpegFilters';

/**
 * Renders video locally using FFmpeg.
 * Requires 'ffmpeg' and 'ffprobe' to be installed in the system.
 */
export class FFmpegVideoRenderer implements IMediaRenderer {
    probe(filePath: string): Promise<MediaProbe> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err: Error | null, data: FfprobeData) => {
                if (err) {
                    reject(new RenderError(`ffprobe failed for ${filePath}: ${err.message}`));
                    return;
                }
                const videoStream = data.streams.find((stream) => stream.codec_type === 'video');
                const duration = Number(data.format.duration);
                resolve({
                    width: videoStream?.width ?? 0,
                    height: videoStream?.height ?? 0,
                    durationSeconds: Number.isFinite(duration) ? duration : 0,
                    hasAudio: data.streams.some((stream) => stream.codec_type === 'audio'),
                });
            });
        });
    }

    async renderVideo(job: VideoRenderJob): Promise<RenderedMedia> {
        const workDir = path.dirname(job.outputPath);
        const base = path.parse(job.outputPath).name;
        const textFiles = job.layout.entries.map((_, i) => path.join(workDir, `${base}_text_${i}.txt`));

        console.log(`[FFmpeg] Rendering ${job.layout.entries.length} rows over ${formatSeconds(job.layout.totalDurationSeconds)}s -> ${job.outputPath}`);

        try {
            await Promise.all(job.layout.entries.map((entry, i) => fs.promises.writeFile(textFiles[i], entry.text, 'utf8')));

            const graph = buildRenderGraph(job, textFiles);
            const cmd = ffmpeg();

            if (job.background.kind === 'image') {
                cmd.input(job.background.path).inputOptions(['-loop 1']);
            } else {
                cmd.input(job.background.path).inputOptions(['-stream_loop -1']);
            }
            if (job.audio) {
                cmd.input(job.audio.path).inputOptions(['-stream_loop -1']);
            }

            cmd.complexFilter(graph.filters, graph.outputs);
            cmd.outputOptions([...REELS_OUTPUT_OPTIONS, `-t ${formatSeconds(job.layout.totalDurationSeconds)}`]);

            await this.run(cmd, job.outputPath);
        } finally {
            await Promise.all(textFiles.map((file) => fs.promises.rm(file, { force: true })));
        }

        return this.describe(job.outputPath);
    }

    async extendDuration(media: RenderedMedia, seconds: number, outputPath: string): Promise<RenderedMedia> {
        const pad = Math.max(0, seconds - media.durationSeconds);
        console.log(`[FFmpeg] Extending ${formatSeconds(media.durationSeconds)}s video to ${formatSeconds(seconds)}s`);

        const cmd = ffmpeg().input(media.path)
            .videoFilters(`tpad=stop_mode=clone:stop_duration=${formatSeconds(pad)}`);
        if (media.hasAudio) {
            cmd.audioFilters(`apad=whole_dur=${formatSeconds(seconds)}`);
        }
        cmd.outputOptions([...REELS_OUTPUT_OPTIONS, `-t ${formatSeconds(seconds)}`]);

        await this.run(cmd, outputPath);
        return this.describe(outputPath);
    }

    async addSilentAudio(media: RenderedMedia, outputPath: string): Promise<RenderedMedia> {
        console.log(`[FFmpeg] Adding silent audio track to ${media.path}`);

        const cmd = ffmpeg()
            .input(media.path)
            .input('anullsrc=channel_layout=stereo:sample_rate=44100')
            .inputFormat('lavfi')
            .outputOptions([
                '-map 0:v',
                '-map 1:a',
                '-c:v copy',
                '-c:a aac',
                '-b:a 128k',
                '-shortest',
                '-movflags +faststart',
            ]);

        await this.run(cmd, outputPath);
        return this.describe(outputPath);
    }

    async conformCanvas(media: RenderedMedia, canvas: CanvasSize, outputPath: string): Promise<RenderedMedia> {
        console.log(`[FFmpeg] Conforming ${media.width}x${media.height} to ${canvas.width}x${canvas.height}`);

        const cmd = ffmpeg()
            .input(media.path)
            .videoFilters([...coverFilter(media, canvas), 'setsar=1'].join(','))
            .outputOptions([...REELS_OUTPUT_OPTIONS]);

        await this.run(cmd, outputPath);
        return this.describe(outputPath);
    }

    private run(cmd: FfmpegCommand, outputPath: string): Promise<void> {
        return new Promise((resolve, reject) => {
            cmd
                .on('end', () => resolve())
                .on('error', (err: Error) => reject(new RenderError(`FFmpeg error: ${err.message}`)))
                .save(outputPath);
        });
    }

    private async describe(outputPath: string): Promise<RenderedMedia> {
        const stats = await fs.promises.stat(outputPath);
        if (stats.size > MAX_REEL_BYTES) {
            throw new RenderError(`Rendered file is ${(stats.size / (1024 * 1024)).toFixed(1)} MB, above the 100 MB Reels limit`);
        }

        const probe = await this.probe(outputPath);
        console.log(`[FFmpeg] ✅ ${outputPath}: ${probe.width}x${probe.height}, ${formatSeconds(probe.durationSeconds)}s, audio=${probe.hasAudio}`);
        return { path: outputPath, ...probe };
    }
}
