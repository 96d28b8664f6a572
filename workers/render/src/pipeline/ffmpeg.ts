import path from 'path';
import fs from 'fs/promises';
import { randomUUID } from 'crypto';
import type { RenderPreset } from '@slidereel/shared';
import { DurationProbeError, RenderInvocationError, errorMessage } from '../errors';
import { runProcess, type ProcessResult, type SpawnFn } from './process';
import { downloadResource, type FetchFn } from './download';
import type { MediaToolkit, SegmentRenderRequest } from './toolkit';

/**
 * Escape a path for an ffmpeg concat list entry.
 * Control characters are dropped so a name cannot inject extra entries.
 */
export function escapeForConcat(filePath: string): string {
    return filePath
        .replace(/[\x00-\x1f]/g, '')
        .replace(/\\/g, '\\\\')
        .replace(/'/g, "'\\''");
}

/**
 * Escape a path used as a filter option value inside a -vf graph.
 * Two levels: the option parser and the graph parser each consume one backslash.
 */
export function escapeFilterPath(filePath: string): string {
    return filePath
        .replace(/\\/g, '/')
        .replace(/([:',;[\]])/g, '\\\\$1');
}

export function buildConcatList(segments: readonly string[], listDir: string): string {
    return segments
        .map((segment) => `file '${escapeForConcat(path.relative(listDir, segment))}'`)
        .join('\n') + '\n';
}

/** scale to the 2x working size, animate, then burn captions in. */
export function buildSlideFilter(zoompan: string, captionPath: string, preset: RenderPreset): string {
    const { width, height } = preset.zoomInput;
    return `scale=${width}:${height},${zoompan},ass=${escapeFilterPath(captionPath)}`;
}

export function buildSegmentArgs(request: SegmentRenderRequest, preset: RenderPreset): string[] {
    return [
        '-hide_banner',
        '-y',
        '-loop', '1', '-t', String(request.duration), '-i', request.imagePath,
        '-i', request.audioPath,
        '-vf', request.filter,
        '-c:v', preset.video.codec, '-preset', preset.video.preset, '-crf', String(preset.video.crf),
        '-c:a', preset.audio.codec, '-b:a', preset.audio.bitrate,
        '-shortest',
        // zoompan emits d frames per looped input frame, so the output needs its own cap
        '-t', String(request.duration),
        request.outputPath
    ];
}

export function buildProbeArgs(file: string): string[] {
    return ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', file];
}

export interface FfmpegToolkitOptions {
    ffmpegPath: string;
    ffprobePath: string;
    preset: RenderPreset;
    timeoutMs?: number;
    spawnFn?: SpawnFn;
    fetchFn?: FetchFn;
    allowLocalFiles?: boolean;
}

function tail(text: string, max = 2000): string {
    return text.length > max ? text.slice(-max) : text;
}

export function createFfmpegToolkit(options: FfmpegToolkitOptions): MediaToolkit {
    const { ffmpegPath, ffprobePath, preset, timeoutMs, spawnFn } = options;

    const runFfmpeg = async (args: string[], description: string, slideIndex?: number): Promise<void> => {
        let result: ProcessResult;
        try {
            result = await runProcess(ffmpegPath, args, { timeoutMs, spawnFn });
        } catch (err) {
            throw new RenderInvocationError(`${description}: could not start ${ffmpegPath}: ${errorMessage(err)}`, {
                exitCode: null,
                stderr: '',
                slideIndex,
                cause: err
            });
        }

        if (result.timedOut) {
            throw new RenderInvocationError(`${description}: timed out after ${timeoutMs}ms`, {
                exitCode: result.exitCode,
                stderr: tail(result.stderr),
                slideIndex
            });
        }
        if (result.exitCode !== 0) {
            console.error(`[ffmpeg] ${description} failed:\n${tail(result.stderr)}`);
            throw new RenderInvocationError(`${description}: ffmpeg exited with code ${result.exitCode}`, {
                exitCode: result.exitCode,
                stderr: tail(result.stderr),
                slideIndex
            });
        }
    };

    return {
        download: (url, destination, slideIndex) =>
            downloadResource(url, destination, {
            slideIndex,
            fetchFn: options.fetchFn,
            allowLocalFiles: options.allowLocalFiles
        }),

        async probeDuration(file) {
            let result: ProcessResult;
            try {
                result = await runProcess(ffprobePath, buildProbeArgs(file), { timeoutMs, spawnFn });
            } catch (err) {
                throw new DurationProbeError(`Could not start ${ffprobePath}: ${errorMessage(err)}`, { cause: err });
            }
            if (result.exitCode !== 0) {
                throw new DurationProbeError(`ffprobe exited with code ${result.exitCode}: ${tail(result.stderr, 500).trim()}`);
            }

            const duration = Number.parseFloat(result.stdout.trim());
            if (!Number.isFinite(duration) || duration < 0) {
                throw new DurationProbeError(`ffprobe returned no usable duration for ${file}: "${result.stdout.trim()}"`);
            }
            return duration;
        },

        renderSegment: (request) =>
            runFfmpeg(buildSegmentArgs(request, preset), `Slide ${request.slideIndex + 1}`, request.slideIndex),

        async concat(segments, outputPath) {
            if (segments.length === 0) {
                throw new RenderInvocationError('No segments to concatenate', { exitCode: null, stderr: '' });
            }

            // The list sits beside the segments so entries stay relative and -safe 0 is not needed
            const listDir = path.dirname(segments[0]);
            const listPath = path.join(listDir, `concat-${randomUUID()}.txt`);
            await fs.writeFile(listPath, buildConcatList(segments, listDir));

            try {
                await runFfmpeg(['-hide_banner', '-y', '-f', 'concat', '-i', listPath, '-c', 'copy', outputPath], 'Concat');
            } finally {
                await fs.rm(listPath, { force: true });
            }
        }
    };
}
