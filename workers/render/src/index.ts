import { Worker, Job } from 'bullmq';
import dotenv from 'dotenv';
import { SLIDESHOW_QUEUE, VERTICAL_1080P } from '@slidereel/shared';
import { loadRenderConfig } from './config';
import { createReporter } from './callback';
import { createFfmpegToolkit } from './pipeline/ffmpeg';
import { runSlideshowJob, type SlideshowJobResult } from './job';

dotenv.config();

process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled Rejection at:', promise, 'reason:', reason);
    process.exit(1);
});

process.on('uncaughtException', (err) => {
    console.error('Uncaught Exception:', err);
    process.exit(1);
});

console.log('--- Render Worker Initialization ---');
console.log('CWD:', process.cwd());
console.log('Node:', process.version);

const config = loadRenderConfig();

const toolkit = createFfmpegToolkit({
    ffmpegPath: config.ffmpegPath,
    ffprobePath: config.ffprobePath,
    preset: VERTICAL_1080P,
    timeoutMs: config.timeoutMs
});

const report = createReporter(config.callback);

// Slides of one job render sequentially; so do jobs.
const worker = new Worker<unknown, SlideshowJobResult>(SLIDESHOW_QUEUE, async (job: Job<unknown, SlideshowJobResult>) =>
    runSlideshowJob(job.data, {
        config,
        toolkit,
        report,
        onProgress: (progress) => job.updateProgress(progress)
    }), {
    connection: config.redis,
    concurrency: 1
});

worker.on('failed', (job, err) => {
    console.error(`Job ${job?.id ?? '(unknown)'} failed: ${err.message}`);
});

const shutdown = async () => {
    console.log('Shutting down render worker...');
    await worker.close();
    process.exit(0);
};

const onSignal = () => {
    shutdown().catch((err) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
    });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

console.log(`Render worker listening on Redis: ${config.redis.host}:${config.redis.port}`);
