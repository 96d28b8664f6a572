import { z } from 'zod';
export * from './render_config';

// Job Stages
export const JobStatusSchema = z.enum([
    'queued',
    'downloading',
    'rendering',
    'concatenating',
    'completed',
    'failed'
]);

export type JobStatus = z.infer<typeof JobStatusSchema>;

// input.json Contract
export const CaptionItemSchema = z.object({
    cap: z.string()
});

// Jobs arriving over HTTP may only reference remote media.
export const RemoteUrlSchema = z.string().url().refine((url) => /^https?:/i.test(url), {
    message: 'Only http(s) URLs are allowed'
});

// The CLI additionally renders media from the local disk.
export const SourceUrlSchema = z.string().url().refine((url) => /^(https?|file):/i.test(url), {
    message: 'Only http(s) and file URLs are allowed'
});

function manifestSchema(urlSchema: typeof RemoteUrlSchema) {
    return z.object({
        list: z.array(CaptionItemSchema).min(1),
        audio_list: z.array(urlSchema),
        duration_list: z.array(z.number().nonnegative()), // milliseconds
        image_list: z.array(urlSchema)
    }).superRefine((manifest, ctx) => {
        const expected = manifest.list.length;
        const lists = ['audio_list', 'duration_list', 'image_list'] as const;
        for (const key of lists) {
            if (manifest[key].length !== expected) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [key],
                    message: `All lists must have the same length (list has ${expected}, ${key} has ${manifest[key].length})`
                });
            }
        }
    });
}

export const SlideshowManifestSchema = manifestSchema(RemoteUrlSchema);
export const LocalSlideshowManifestSchema = manifestSchema(SourceUrlSchema);

export type SlideshowManifest = z.infer<typeof SlideshowManifestSchema>;

// Per-job overrides of the worker defaults
export const RenderSettingsSchema = z.object({
    intensity: z.number().min(0).max(1).optional(),
    frequency: z.number().min(0).max(10).optional(), // keyframe segments per second
    fps: z.number().int().min(1).max(120).optional()
});

export type RenderSettings = z.infer<typeof RenderSettingsSchema>;

export const CreateJobRequestSchema = z.object({
    manifest: SlideshowManifestSchema,
    settings: RenderSettingsSchema.optional()
});

export type CreateJobRequest = z.infer<typeof CreateJobRequestSchema>;

// Queue payload for slideshow-jobs
export const SlideshowJobDataSchema = CreateJobRequestSchema.extend({
    jobId: z.string().uuid()
});

export type SlideshowJobData = z.infer<typeof SlideshowJobDataSchema>;

export const SLIDESHOW_QUEUE = 'slideshow-jobs';

// Worker Callback Payload
export const WorkerCallbackSchema = z.discriminatedUnion('event', [
    z.object({
        event: z.literal('stage'),
        jobId: z.string().uuid(),
        status: JobStatusSchema,
        progress: z.number().min(0).max(100),
        slide: z.object({
            index: z.number().int().nonnegative(),
            total: z.number().int().positive()
        }).optional()
    }),
    z.object({
        event: z.literal('asset'),
        jobId: z.string().uuid(),
        kind: z.literal('final_video'),
        url: z.string(),
        durationSeconds: z.number().nonnegative().optional()
    }),
    z.object({
        event: z.literal('error'),
        jobId: z.string().uuid(),
        errorCode: z.string(),
        message: z.string(),
        slideIndex: z.number().int().nonnegative().optional(),
        retryable: z.boolean().default(false)
    })
]);

export type WorkerCallback = z.infer<typeof WorkerCallbackSchema>;
export type WorkerCallbackInput = z.input<typeof WorkerCallbackSchema>;
