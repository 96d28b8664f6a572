import path from 'path';
import { SlideshowJobDataSchema, type RenderSettings, type SlideshowJobData } from '@slidereel/shared';
import type { RenderConfig } from './config';
import { SlideshowError, ValidationError, errorMessage } from './errors';
import type { Reporter } from './callback';
import { assembleSlideshow, type AssemblyResult } from './pipeline/assemble';
import type { MediaToolkit } from './pipeline/toolkit';
import type { RandomSource } from './motion/random';

export interface JobDependencies {
    config: RenderConfig;
    toolkit: MediaToolkit;
    report: Reporter;
    random?: RandomSource;
    onProgress?: (progress: number) => void | Promise<void>;
}

export interface SlideshowJobResult {
    jobId: string;
    outputPath: string;
    durationSeconds: number;
    slides: number;
}

export function parseJobData(input: unknown): SlideshowJobData {
    const parsed = SlideshowJobDataSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError(
            'Invalid slideshow job payload',
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

export function effectiveSettings(config: RenderConfig, overrides: RenderSettings = {}): Required<RenderSettings> {
    return {
        intensity: overrides.intensity ?? config.intensity,
        frequency: overrides.frequency ?? config.frequency,
        fps: overrides.fps ?? config.fps
    };
}

/** One slideshow job end to end, with progress and failures reported back to the API. */
export async function runSlideshowJob(input: unknown, deps: JobDependencies): Promise<SlideshowJobResult> {
    const { jobId, manifest, settings } = parseJobData(input);
    const { config, report } = deps;
    const outputPath = path.join(config.outputDir, `${jobId}.mp4`);

    console.log(`[${jobId}] Starting slideshow render (${manifest.list.length} slides)`);

    let result: AssemblyResult;
    try {
        result = await assembleSlideshow(manifest, {
            outputPath,
            toolkit: deps.toolkit,
            settings: effectiveSettings(config, settings),
            captionMaxWidth: config.captionMaxWidth,
            random: deps.random,
            onProgress: async ({ stage, progress, slideIndex, total }) => {
                console.log(`[${jobId}] ${stage} ${progress}%`);
                await deps.onProgress?.(progress);
                if (stage === 'completed') return;
                await report({
                    event: 'stage',
                    jobId,
                    status: stage,
                    progress,
                    slide: slideIndex === undefined ? undefined : { index: slideIndex, total }
                });
            }
        });
    } catch (err) {
        console.error(`[${jobId}] Render failed:`, err);
        await report({
            event: 'error',
            jobId,
            errorCode: err instanceof SlideshowError ? err.code : 'RENDER_FAILURE',
            message: errorMessage(err),
            slideIndex: err instanceof SlideshowError ? err.slideIndex : undefined
        });
        throw err;
    }

    await report({ event: 'asset', jobId, kind: 'final_video', url: result.outputPath, durationSeconds: result.duration });
    await report({ event: 'stage', jobId, status: 'completed', progress: 100 });
    console.log(`[${jobId}] Render completed!`);

    return {
        jobId,
        outputPath: result.outputPath,
        durationSeconds: result.duration,
        slides: result.slides.length
    };
}
