import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { CreateJobRequestSchema, WorkerCallbackSchema, type WorkerCallback } from '@slidereel/shared';
import type { JobQueue } from './queue';

export interface ApiDependencies {
    queue: JobQueue;
    callbackToken?: string;
    keepAliveMs?: number;
    logger?: FastifyServerOptions['logger'];
}

interface JobParams {
    jobId: string;
}

export interface JobEvent {
    jobId: string;
    type: 'progress' | 'asset' | 'error';
    status?: string;
    progress?: number;
    message: string;
    assetUrl?: string;
}

export function toJobEvent(payload: WorkerCallback): JobEvent {
    switch (payload.event) {
        case 'stage':
            return {
                jobId: payload.jobId,
                type: 'progress',
                status: payload.status,
                progress: payload.progress,
                message: payload.slide
                    ? `Executing ${payload.status} (slide ${payload.slide.index + 1}/${payload.slide.total})`
                    : `Executing ${payload.status}`
            };
        case 'asset':
            return {
                jobId: payload.jobId,
                type: 'asset',
                message: `Asset generated: ${payload.kind}`,
                assetUrl: payload.url
            };
        case 'error':
            return {
                jobId: payload.jobId,
                type: 'error',
                status: 'failed',
                message: `Error: ${payload.message}`
            };
    }
}

export function buildServer(deps: ApiDependencies): FastifyInstance {
    const fastify = Fastify({ logger: deps.logger ?? true });
    const jobEvents = new EventEmitter();
    // Increase limit for concurrent job listeners
    jobEvents.setMaxListeners(100);

    fastify.register(cors);

    // 1. Health check
    fastify.get('/health', async () => {
        return { status: 'ok' };
    });

    // 2. Create Job
    fastify.post('/v1/jobs', async (request, reply) => {
        const parsed = CreateJobRequestSchema.safeParse(request.body);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid job request', details: parsed.error.issues });
        }

        const jobId = randomUUID();
        try {
            await deps.queue.enqueue({ jobId, ...parsed.data });
        } catch (queueError) {
            request.log.error({ err: queueError, jobId }, 'Failed to enqueue job');
            return reply.status(500).send({ error: 'Failed to enqueue job' });
        }

        request.log.info({ jobId, slides: parsed.data.manifest.list.length }, 'Job enqueued');
        return reply.status(202).send({ jobId, status: 'queued' });
    });

    // 3. Job Status
    fastify.get<{ Params: JobParams }>('/v1/jobs/:jobId', async (request, reply) => {
        const { jobId } = request.params;
        const status = await deps.queue.getStatus(jobId);
        if (!status) {
            return reply.status(404).send({ error: 'Job not found' });
        }
        return status;
    });

    // 4. Real-time Events (SSE)
    fastify.get<{ Params: JobParams }>('/v1/jobs/:jobId/events', (request, reply) => {
        const { jobId } = request.params;

        reply.raw.setHeader('Content-Type', 'text/event-stream');
        reply.raw.setHeader('Cache-Control', 'no-cache');
        reply.raw.setHeader('Connection', 'keep-alive');

        const onEvent = (eventData: JobEvent) => {
            if (eventData.jobId === jobId) {
                reply.raw.write(`data: ${JSON.stringify(eventData)}\n\n`);
            }
        };

        jobEvents.on('update', onEvent);

        const interval = setInterval(() => {
            reply.raw.write(`data: ${JSON.stringify({ type: 'keep-alive' })}\n\n`);
        }, deps.keepAliveMs ?? 15000);

        request.raw.on('close', () => {
            jobEvents.off('update', onEvent);
            clearInterval(interval);
        });
    });

    // 5. Worker Callback (Internal)
    fastify.post('/v1/internal/workers/callback', async (request, reply) => {
        if (deps.callbackToken && request.headers.authorization !== `Bearer ${deps.callbackToken}`) {
            return reply.status(401).send({ error: 'Unauthorized' });
        }

        const result = WorkerCallbackSchema.safeParse(request.body);
        if (!result.success) {
            return reply.status(400).send({ error: 'Invalid callback payload', details: result.error.issues });
        }

        const payload = result.data;
        fastify.log.info({ workerEvent: payload }, 'Received worker event');
        jobEvents.emit('update', toJobEvent(payload));

        return { success: true };
    });

    return fastify;
}
