import path from 'path';
import fs from 'fs/promises';
import os from 'os';
import {
    LocalSlideshowManifestSchema,
    SlideshowManifestSchema,
    VERTICAL_1080P,
    type RenderPreset,
    type RenderSettings,
    type SlideshowManifest
} from '@slidereel/shared';
import { ValidationError } from '../errors';
import { mathRandom, type RandomSource } from '../motion/random';
import { renderSlide, type SlideInput, type SlideResult } from './slide';
import type { MediaToolkit } from './toolkit';

export type AssemblyStage = 'downloading' | 'rendering' | 'concatenating' | 'completed';

export interface AssemblyProgress {
    stage: AssemblyStage;
    progress: number; // 0-100
    slideIndex?: number;
    total: number;
}

export interface AssembleOptions {
    outputPath: string;
    toolkit: MediaToolkit;
    preset?: RenderPreset;
    settings?: RenderSettings;
    captionMaxWidth?: number;
    random?: RandomSource;
    /** Parent for the scoped working directory; defaults to the OS temp dir. */
    tempRoot?: string;
    /** Accept `file:` sources in the manifest. The toolkit must be created with the same flag. */
    allowLocalFiles?: boolean;
    onProgress?: (progress: AssemblyProgress) => void | Promise<void>;
}

export interface AssemblyResult {
    outputPath: string;
    duration: number;
    slides: SlideResult[];
}

export function parseManifest(input: unknown, allowLocalFiles = false): SlideshowManifest {
    const schema = allowLocalFiles ? LocalSlideshowManifestSchema : SlideshowManifestSchema;
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError(
            'Invalid slideshow manifest',
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

export function toSlides(manifest: SlideshowManifest): SlideInput[] {
    return manifest.list.map((item, index) => ({
        index,
        captionText: item.cap,
        durationTarget: manifest.duration_list[index] / 1000,
        audioUrl: manifest.audio_list[index],
        imageUrl: manifest.image_list[index]
    }));
}

/**
 * Renders every slide in order inside a scoped temp directory and concatenates the
 * segments. The first failing slide aborts the batch; the temp directory is always removed.
 */
export async function assembleSlideshow(manifestInput: unknown, options: AssembleOptions): Promise<AssemblyResult> {
    const manifest = parseManifest(manifestInput, options.allowLocalFiles);
    const slides = toSlides(manifest);
    const preset = options.preset ?? VERTICAL_1080P;
    const settings = options.settings ?? {};
    const total = slides.length;
    const report = async (progress: AssemblyProgress) => {
        if (options.onProgress) await options.onProgress(progress);
    };

    const workDir = await fs.mkdtemp(path.join(options.tempRoot ?? os.tmpdir(), 'slidereel-'));
    try {
        const results: SlideResult[] = [];
        for (const slide of slides) {
            results.push(await renderSlide(slide, {
                toolkit: options.toolkit,
                preset,
                workDir,
                random: options.random ?? mathRandom,
                intensity: settings.intensity ?? preset.intensity,
                frequency: settings.frequency ?? 0,
                fps: settings.fps ?? preset.fps,
                captionMaxWidth: options.captionMaxWidth ?? preset.captionMaxWidth,
                total,
                onStage: (stage) => report({
                    stage,
                    progress: Math.floor(((slide.index + (stage === 'rendering' ? 0.5 : 0)) / total) * 90),
                    slideIndex: slide.index,
                    total
                })
            }));
        }

        await report({ stage: 'concatenating', progress: 90, total });
        await fs.mkdir(path.dirname(path.resolve(options.outputPath)), { recursive: true });
        await options.toolkit.concat(results.map((r) => r.outputPath), options.outputPath);

        const duration = results.reduce((sum, r) => sum + r.duration, 0);
        await report({ stage: 'completed', progress: 100, total });
        console.log(`Slideshow written to ${options.outputPath} (${total} slides, ${duration.toFixed(2)}s)`);

        return { outputPath: options.outputPath, duration, slides: results };
    } finally {
        await fs.rm(workDir, { recursive: true, force: true });
    }
}
