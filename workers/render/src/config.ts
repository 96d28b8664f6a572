import path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';

const RenderConfigSchema = z.object({
    FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
    FFPROBE_PATH: z.string().min(1).default('ffprobe'),
    EFFECT_INTENSITY: z.coerce.number().min(0).max(1).default(0.3),
    MOTION_FREQUENCY: z.coerce.number().min(0).max(10).default(0),
    RENDER_FPS: z.coerce.number().int().min(1).max(120).default(25),
    RENDER_TIMEOUT_MS: z.coerce.number().int().min(0).default(600_000),
    CAPTION_MAX_WIDTH: z.coerce.number().positive().default(13),
    OUTPUT_DIR: z.string().min(1).default('./output'),
    REDIS_HOST: z.string().min(1).default('127.0.0.1'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    CALLBACK_URL: z.string().url().optional(),
    CALLBACK_TOKEN: z.string().optional()
});

export interface RenderConfig {
    ffmpegPath: string;
    ffprobePath: string;
    intensity: number;
    frequency: number;
    fps: number;
    timeoutMs: number;
    captionMaxWidth: number;
    outputDir: string;
    redis: { host: string; port: number };
    callback?: { url: string; token?: string };
}

// Empty strings in .env files mean "unset".
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') result[key] = value;
    }
    return result;
}

export function loadRenderConfig(env: NodeJS.ProcessEnv = process.env): RenderConfig {
    const parsed = RenderConfigSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        throw new ValidationError(
            'Invalid render worker configuration',
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const e = parsed.data;
    return {
        ffmpegPath: e.FFMPEG_PATH,
        ffprobePath: e.FFPROBE_PATH,
        intensity: e.EFFECT_INTENSITY,
        frequency: e.MOTION_FREQUENCY,
        fps: e.RENDER_FPS,
        timeoutMs: e.RENDER_TIMEOUT_MS,
        captionMaxWidth: e.CAPTION_MAX_WIDTH,
        outputDir: path.resolve(e.OUTPUT_DIR),
        redis: { host: e.REDIS_HOST, port: e.REDIS_PORT },
        callback: e.CALLBACK_URL ? { url: e.CALLBACK_URL, token: e.CALLBACK_TOKEN } : undefined
    };
}
