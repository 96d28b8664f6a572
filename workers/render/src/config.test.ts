import path from 'path';
import { loadRenderConfig } from './config';
import { ValidationError } from './errors';

describe('loadRenderConfig', () => {
    it('falls back to the defaults', () => {
        expect(loadRenderConfig({})).toEqual({
            ffmpegPath: 'ffmpeg',
            ffprobePath: 'ffprobe',
            intensity: 0.3,
            frequency: 0,
            fps: 25,
            timeoutMs: 600000,
            captionMaxWidth: 13,
            outputDir: path.resolve('./output'),
            redis: { host: '127.0.0.1', port: 6379 },
            callback: undefined
        });
    });

    it('coerces numeric variables', () => {
        const config = loadRenderConfig({
            EFFECT_INTENSITY: '0.6',
            MOTION_FREQUENCY: '0.5',
            RENDER_FPS: '30',
            REDIS_PORT: '6380',
            OUTPUT_DIR: '/srv/renders'
        });

        expect(config.intensity).toBe(0.6);
        expect(config.frequency).toBe(0.5);
        expect(config.fps).toBe(30);
        expect(config.redis.port).toBe(6380);
        expect(config.outputDir).toBe('/srv/renders');
    });

    it('treats blank values as unset', () => {
        const config = loadRenderConfig({ CALLBACK_URL: '', FFMPEG_PATH: '  ' });
        expect(config.callback).toBeUndefined();
        expect(config.ffmpegPath).toBe('ffmpeg');
    });

    it('enables callbacks when a URL is configured', () => {
        const config = loadRenderConfig({ CALLBACK_URL: 'http://localhost:3001/v1/internal/workers/callback', CALLBACK_TOKEN: 'test-secret' });
        expect(config.callback).toEqual({ url: 'http://localhost:3001/v1/internal/workers/callback', token: 'test-secret' });
    });

    it('rejects out-of-range values', () => {
        expect(() => loadRenderConfig({ EFFECT_INTENSITY: '2' })).toThrow(
            'Invalid render worker configuration: EFFECT_INTENSITY: Number must be less than or equal to 1'
        );
        expect(() => loadRenderConfig({ RENDER_FPS: 'fast' })).toThrow(ValidationError);
    });
});
