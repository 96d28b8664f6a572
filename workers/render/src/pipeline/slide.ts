import path from 'path';
import fs from 'fs/promises';
import type { RenderPreset } from '@slidereel/shared';
import { DurationProbeError } from '../errors';
import { buildCaptions } from '../captions/caption-track';
import type { CaptionTrack } from '../captions/paginator';
import { generateMotion, type MotionPlan } from '../motion/keyframes';
import { buildZoompanFilter } from '../motion/expression';
import type { RandomSource } from '../motion/random';
import { buildSlideFilter } from './ffmpeg';
import type { MediaToolkit } from './toolkit';

export interface SlideInput {
    index: number;
    captionText: string;
    durationTarget: number; // seconds
    imageUrl: string;
    audioUrl: string;
}

export interface SlideContext {
    toolkit: MediaToolkit;
    preset: RenderPreset;
    workDir: string;
    random: RandomSource;
    intensity: number;
    frequency: number;
    fps: number;
    captionMaxWidth: number;
    total: number;
    onStage?: (stage: 'downloading' | 'rendering') => void | Promise<void>;
}

export interface SlideResult {
    index: number;
    outputPath: string;
    duration: number;
    motion: MotionPlan;
    captions: CaptionTrack;
}

/**
 * Rendered length: the shorter of the declared and measured audio durations.
 * A failed probe keeps the declared duration.
 */
export async function resolveDuration(toolkit: MediaToolkit, audioPath: string, durationTarget: number, label: string): Promise<number> {
    try {
        const actual = await toolkit.probeDuration(audioPath);
        const duration = Math.min(durationTarget, actual);
        console.log(`${label} Using audio duration: ${duration.toFixed(2)}s`);
        return duration;
    } catch (err) {
        if (!(err instanceof DurationProbeError)) throw err;
        console.warn(`${label} Could not measure audio duration, keeping ${durationTarget.toFixed(2)}s: ${err.message}`);
        return durationTarget;
    }
}

export async function renderSlide(slide: SlideInput, ctx: SlideContext): Promise<SlideResult> {
    const { toolkit, preset, workDir } = ctx;
    const { index } = slide;
    const label = `[slide ${index + 1}/${ctx.total}]`;
    console.log(`${label} Processing...`);

    const audioPath = path.join(workDir, `audio_${index}.mp3`);
    const imagePath = path.join(workDir, `image_${index}.jpg`);
    const captionPath = path.join(workDir, `subtitle_${index}.ass`);
    const outputPath = path.join(workDir, `segment_${index}.mp4`);

    await ctx.onStage?.('downloading');
    await toolkit.download(slide.audioUrl, audioPath, index);
    await toolkit.download(slide.imageUrl, imagePath, index);

    const duration = await resolveDuration(toolkit, audioPath, slide.durationTarget, label);

    const motion = generateMotion({
        duration,
        intensity: ctx.intensity,
        fps: ctx.fps,
        width: preset.zoomInput.width,
        height: preset.zoomInput.height,
        frequency: ctx.frequency,
        maxZoomSpan: preset.maxZoomSpan,
        random: ctx.random
    });
    const zoompan = buildZoompanFilter(motion, ctx.fps, preset.output);

    const { track, document } = buildCaptions(slide.captionText, duration, {
        maxWidth: ctx.captionMaxWidth,
        linesPerPage: preset.captionLinesPerPage,
        canvas: preset.output,
        style: preset.caption
    });
    await fs.writeFile(captionPath, document, 'utf-8');

    console.log(`${label} Motion: ${motion.kind === 'animated' ? motion.pattern : 'static'}, caption pages: ${track.pages.length}`);

    await ctx.onStage?.('rendering');
    await toolkit.renderSegment({
        slideIndex: index,
        imagePath,
        audioPath,
        duration,
        filter: buildSlideFilter(zoompan, captionPath, preset),
        outputPath
    });
    console.log(`${label} Segment ready`);

    return { index, outputPath, duration, motion, captions: track };
}
