import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { VERTICAL_1080P } from '@slidereel/shared';
import { loadRenderConfig } from './config';
import { ValidationError, errorMessage } from './errors';
import { createFfmpegToolkit } from './pipeline/ffmpeg';
import { assembleSlideshow } from './pipeline/assemble';
import { effectiveSettings } from './job';

dotenv.config();

const USAGE = 'Usage: tsx cli-render.ts <manifest-json-path> [output.mp4]';

function readManifest(manifestPath: string): unknown {
    let raw: string;
    try {
        raw = fs.readFileSync(manifestPath, 'utf-8');
    } catch (err) {
        throw new ValidationError(`Cannot read manifest ${manifestPath}`, [errorMessage(err)]);
    }
    try {
        return JSON.parse(raw);
    } catch (err) {
        throw new ValidationError(`Manifest ${manifestPath} is not valid JSON`, [errorMessage(err)]);
    }
}

// CLI Entry Point
async function main() {
    const args = process.argv.slice(2);
    if (args.length < 1) {
        console.error(USAGE);
        process.exit(1);
    }

    const [manifestPath, outputArg] = args;
    const config = loadRenderConfig();
    const outputPath = path.resolve(outputArg ?? 'output.mp4');

    const manifest = readManifest(manifestPath);

    const toolkit = createFfmpegToolkit({
        ffmpegPath: config.ffmpegPath,
        ffprobePath: config.ffprobePath,
        preset: VERTICAL_1080P,
        timeoutMs: config.timeoutMs,
        allowLocalFiles: true
    });

    console.log(`Rendering ${manifestPath} -> ${outputPath}`);
    await assembleSlideshow(manifest, {
        outputPath,
        toolkit,
        settings: effectiveSettings(config),
        captionMaxWidth: config.captionMaxWidth,
        allowLocalFiles: true,
        onProgress: ({ stage, progress, slideIndex, total }) => {
            const slide = slideIndex === undefined ? '' : ` (slide ${slideIndex + 1}/${total})`;
            console.log(`[${progress}%] ${stage}${slide}`);
        }
    });
}

main().catch(e => {
    console.error(e instanceof ValidationError ? e.message : e);
    process.exit(1);
});
