export interface Page {
    lines: string[];
    /** Code-point count of all lines; drives the page's share of the slide. */
    charCount: number;
}

export interface TimedPage extends Page {
    start: number; // seconds, inclusive
    end: number; // seconds, exclusive
}

export interface CaptionTrack {
    duration: number;
    pages: TimedPage[];
}

export const DEFAULT_LINES_PER_PAGE = 2;

export function countChars(line: string): number {
    return Array.from(line).length;
}

export function paginate(lines: string[], pageSize: number = DEFAULT_LINES_PER_PAGE): Page[] {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
        throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }

    const pages: Page[] = [];
    for (let i = 0; i < lines.length; i += pageSize) {
        const pageLines = lines.slice(i, i + pageSize);
        pages.push({
            lines: pageLines,
            charCount: pageLines.reduce((sum, line) => sum + countChars(line), 0)
        });
    }
    return pages;
}

/**
 * Gives each page a contiguous window proportional to its character count.
 * The last page always ends at exactly `totalDuration`.
 */
export function allocateDurations(pages: Page[], totalDuration: number): CaptionTrack {
    const duration = Number.isFinite(totalDuration) && totalDuration > 0 ? totalDuration : 0;
    const source: Page[] = pages.length > 0 ? pages : [{ lines: [], charCount: 0 }];

    let totalChars = source.reduce((sum, page) => sum + page.charCount, 0);
    if (totalChars === 0) totalChars = 1;

    const timed: TimedPage[] = [];
    let cursor = 0;

    source.forEach((page, i) => {
        const isLast = i === source.length - 1;
        const end = isLast
            ? duration
            : Math.min(duration, cursor + (page.charCount / totalChars) * duration);

        timed.push({ ...page, start: cursor, end });
        cursor = end;
    });

    return { duration, pages: timed };
}
