import * as dotenv from 'dotenv';
import { buildServer } from './app';
import { createBullJobQueue } from './queue';

dotenv.config();

const queue = createBullJobQueue({
    host: process.env.REDIS_HOST || '127.0.0.1',
    port: parseInt(process.env.REDIS_PORT || '6379')
});

const fastify = buildServer({
    queue,
    callbackToken: process.env.CALLBACK_TOKEN || undefined
});

fastify.addHook('onClose', async () => {
    await queue.close();
});

const start = async () => {
    try {
        await fastify.listen({ port: parseInt(process.env.PORT || '3001'), host: '0.0.0.0' });
    } catch (err) {
        fastify.log.error(err);
        process.exit(1);
    }
};

void start();
