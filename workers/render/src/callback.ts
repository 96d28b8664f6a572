import { WorkerCallbackSchema, type WorkerCallbackInput } from '@slidereel/shared';
import { errorMessage } from './errors';
import type { FetchFn } from './pipeline/download';

export type Reporter = (payload: WorkerCallbackInput) => Promise<void>;

/**
 * Posts worker events to the API. Reporting is best effort: a failed callback is
 * logged and never fails the render.
 */
export function createReporter(target?: { url: string; token?: string }, fetchFn: FetchFn = fetch): Reporter {
    return async (payload) => {
        if (!target) return;

        const checked = WorkerCallbackSchema.safeParse(payload);
        if (!checked.success) {
            console.error('Refusing to send malformed callback:', checked.error.issues);
            return;
        }

        try {
            const res = await fetchFn(target.url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    ...(target.token ? { Authorization: `Bearer ${target.token}` } : {})
                },
                body: JSON.stringify(checked.data)
            });
            if (!res.ok) {
                console.error(`Failed to report status: HTTP ${res.status}`);
            }
        } catch (e) {
            console.error('Failed to report status:', errorMessage(e));
        }
    };
}
