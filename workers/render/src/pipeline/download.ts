import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { ResourceFetchError, errorMessage } from '../errors';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface DownloadOptions {
    slideIndex?: number;
    fetchFn?: FetchFn;
    /** Copy `file:` URLs from disk. Off for queued jobs. */
    allowLocalFiles?: boolean;
}

/** Fetches an http(s) `url` into `destination`; `file:` URLs are copied when allowed. */
export async function downloadResource(url: string, destination: string, options: DownloadOptions = {}): Promise<void> {
    const { slideIndex } = options;
    console.log(`[download] ${url}`);

    if (/^file:/i.test(url)) {
        if (!options.allowLocalFiles) {
            throw new ResourceFetchError(url, 'local files are not allowed', { slideIndex });
        }
        try {
            await fs.copyFile(fileURLToPath(url), destination);
        } catch (err) {
            throw new ResourceFetchError(url, errorMessage(err), { slideIndex, cause: err });
        }
        return;
    }

    if (!/^https?:/i.test(url)) {
        throw new ResourceFetchError(url, 'unsupported URL scheme', { slideIndex });
    }

    const fetchFn = options.fetchFn ?? fetch;
    let response: Response;
    try {
        response = await fetchFn(url);
    } catch (err) {
        throw new ResourceFetchError(url, errorMessage(err), { slideIndex, cause: err });
    }

    if (!response.ok) {
        // release the connection before failing
        await response.body?.cancel().catch((err: unknown) => {
            console.warn(`[download] could not discard response body: ${errorMessage(err)}`);
        });
        throw new ResourceFetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
            slideIndex,
            status: response.status
        });
    }

    try {
        const body = Buffer.from(await response.arrayBuffer());
        await fs.writeFile(destination, body);
    } catch (err) {
        throw new ResourceFetchError(url, errorMessage(err), { slideIndex, cause: err });
    }
    console.log(`[download] saved ${destination}`);
}
