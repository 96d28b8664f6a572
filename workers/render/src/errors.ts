export type SlideshowErrorCode =
    | 'VALIDATION_FAILED'
    | 'RESOURCE_FETCH_FAILED'
    | 'DURATION_PROBE_FAILED'
    | 'RENDER_FAILURE';

export abstract class SlideshowError extends Error {
    abstract readonly code: SlideshowErrorCode;
    readonly slideIndex?: number;

    constructor(message: string, options?: { slideIndex?: number; cause?: unknown }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.slideIndex = options?.slideIndex;
    }
}

/** Malformed or inconsistent manifest/config. Raised before any slide is processed. */
export class ValidationError extends SlideshowError {
    readonly code = 'VALIDATION_FAILED';
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}

export class ResourceFetchError extends SlideshowError {
    readonly code = 'RESOURCE_FETCH_FAILED';
    readonly url: string;
    readonly status?: number;

    constructor(url: string, reason: string, options?: { slideIndex?: number; status?: number; cause?: unknown }) {
        super(`Failed to download ${url}: ${reason}`, options);
        this.url = url;
        this.status = options?.status;
    }
}

// Recovered locally: the slide falls back to the manifest duration.
export class DurationProbeError extends SlideshowError {
    readonly code = 'DURATION_PROBE_FAILED';
}

export class RenderInvocationError extends SlideshowError {
    readonly code = 'RENDER_FAILURE';
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(
        message: string,
        details: { exitCode: number | null; stderr: string; slideIndex?: number; cause?: unknown }
    ) {
        super(message, details);
        this.exitCode = details.exitCode;
        this.stderr = details.stderr;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
