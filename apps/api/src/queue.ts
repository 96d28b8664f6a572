import { Queue } from 'bullmq';
import { SLIDESHOW_QUEUE, type SlideshowJobData } from '@slidereel/shared';

export interface JobStatusView {
    jobId: string;
    state: string; // waiting | active | completed | failed | delayed | ...
    progress: number;
    outputPath?: string;
    failedReason?: string;
}

/** What the routes need from the queue; BullMQ in production, an in-memory fake in tests. */
export interface JobQueue {
    enqueue(data: SlideshowJobData): Promise<void>;
    getStatus(jobId: string): Promise<JobStatusView | null>;
    close(): Promise<void>;
}

function readOutputPath(returnvalue: unknown): string | undefined {
    if (typeof returnvalue === 'object' && returnvalue !== null && 'outputPath' in returnvalue) {
        const { outputPath } = returnvalue;
        return typeof outputPath === 'string' ? outputPath : undefined;
    }
    return undefined;
}

export function createBullJobQueue(connection: { host: string; port: number }): JobQueue {
    const queue = new Queue(SLIDESHOW_QUEUE, { connection });

    return {
        async enqueue(data) {
            await queue.add('render-slideshow', data, {
                jobId: data.jobId,
                removeOnComplete: { age: 24 * 3600 },
                removeOnFail: { age: 7 * 24 * 3600 }
            });
        },

        async getStatus(jobId) {
            const job = await queue.getJob(jobId);
            if (!job) return null;

            const state = await job.getState();
            return {
                jobId,
                state,
                progress: typeof job.progress === 'number' ? job.progress : 0,
                outputPath: readOutputPath(job.returnvalue),
                failedReason: job.failedReason || undefined
            };
        },

        close: () => queue.close()
    };
}
