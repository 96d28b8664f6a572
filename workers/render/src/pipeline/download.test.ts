import fs from 'fs';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { ResourceFetchError } from '../errors';
import { downloadResource, type FetchFn } from './download';

describe('downloadResource', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'slidereel-download-'));
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    it('writes the response body to the destination', async () => {
        const requested: string[] = [];
        const fetchFn: FetchFn = async (input) => {
            requested.push(input);
            return new Response('jpeg-bytes');
        };
        const destination = path.join(dir, 'image_0.jpg');

        await downloadResource('https://media.test/slide-0.jpg', destination, { fetchFn });

        expect(requested).toEqual(['https://media.test/slide-0.jpg']);
        expect(fs.readFileSync(destination, 'utf-8')).toBe('jpeg-bytes');
    });

    it('reports the HTTP status of a failed response', async () => {
        const fetchFn: FetchFn = async () => new Response('missing', { status: 404 });

        const err = await downloadResource('https://media.test/a.mp3', path.join(dir, 'a.mp3'), { fetchFn, slideIndex: 2 })
            .catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ResourceFetchError);
        if (!(err instanceof ResourceFetchError)) return;
        expect(err.code).toBe('RESOURCE_FETCH_FAILED');
        expect(err.status).toBe(404);
        expect(err.slideIndex).toBe(2);
        expect(err.url).toBe('https://media.test/a.mp3');
        expect(err.message).toBe('Failed to download https://media.test/a.mp3: HTTP 404');
        expect(fs.existsSync(path.join(dir, 'a.mp3'))).toBe(false);
    });

    it('wraps network failures', async () => {
        const fetchFn: FetchFn = async () => {
            throw new TypeError('fetch failed');
        };

        await expect(downloadResource('https://media.test/a.mp3', path.join(dir, 'a.mp3'), { fetchFn }))
            .rejects.toThrow('Failed to download https://media.test/a.mp3: fetch failed');
    });

    it('copies file: URLs from disk', async () => {
        const source = path.join(dir, 'source.mp3');
        fs.writeFileSync(source, 'mp3-bytes');
        const destination = path.join(dir, 'audio_0.mp3');

        await downloadResource(pathToFileURL(source).href, destination, { allowLocalFiles: true });

        expect(fs.readFileSync(destination, 'utf-8')).toBe('mp3-bytes');
    });

    it('fails on a missing local file', async () => {
        const missing = pathToFileURL(path.join(dir, 'nope.mp3')).href;

        await expect(downloadResource(missing, path.join(dir, 'audio_0.mp3'), { slideIndex: 0, allowLocalFiles: true }))
            .rejects.toBeInstanceOf(ResourceFetchError);
    });

    it('refuses file: URLs unless local files are allowed', async () => {
        const source = path.join(dir, 'secret.txt');
        fs.writeFileSync(source, 'do-not-copy');
        const destination = path.join(dir, 'image_0.jpg');

        await expect(downloadResource(pathToFileURL(source).href, destination, { slideIndex: 0 }))
            .rejects.toThrow('local files are not allowed');
        expect(fs.existsSync(destination)).toBe(false);
    });

    it('refuses schemes other than http(s)', async () => {
        const fetchFn: FetchFn = async () => new Response('never');

        await expect(downloadResource('ftp://media.test/a.mp3', path.join(dir, 'a.mp3'), { fetchFn }))
            .rejects.toThrow('Failed to download ftp://media.test/a.mp3: unsupported URL scheme');
    });

    it('discards the body of a failed response', async () => {
        const response = new Response('server error page', { status: 500 });
        const body = response.body;
        if (!body) throw new Error('expected a response body');
        const cancel = jest.spyOn(body, 'cancel');

        await expect(downloadResource('https://media.test/a.mp3', path.join(dir, 'a.mp3'), { fetchFn: async () => response }))
            .rejects.toThrow('HTTP 500');
        expect(cancel).toHaveBeenCalledTimes(1);
    });
});
