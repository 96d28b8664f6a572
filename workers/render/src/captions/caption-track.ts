import { VERTICAL_1080P, type CaptionStyle, type FrameSize } from '@slidereel/shared';
import { wrap } from './text-measurer';
import { allocateDurations, paginate, type CaptionTrack } from './paginator';

// ASS hard line break inside a single event
export const ASS_LINE_BREAK = '\\N';

const STYLE_FORMAT = [
    'Name', 'Fontname', 'Fontsize', 'PrimaryColour', 'SecondaryColour', 'OutlineColour', 'BackColour',
    'Bold', 'Italic', 'Underline', 'StrikeOut', 'ScaleX', 'ScaleY', 'Spacing', 'Angle',
    'BorderStyle', 'Outline', 'Shadow', 'Alignment', 'MarginL', 'MarginR', 'MarginV', 'Encoding'
];

const EVENT_FORMAT = ['Layer', 'Start', 'End', 'Style', 'Name', 'MarginL', 'MarginR', 'MarginV', 'Effect', 'Text'];

// Absorbs binary representation error (0.29 * 100 = 28.999...) before truncating.
const CENTISECOND_EPSILON = 1e-6;

/** Seconds to `H:MM:SS.CC`, centiseconds truncated. */
export function formatAssTime(seconds: number): string {
    const totalCs = Math.floor(Math.max(0, seconds) * 100 + CENTISECOND_EPSILON);
    const cs = totalCs % 100;
    const totalSeconds = Math.floor(totalCs / 100);
    const s = totalSeconds % 60;
    const m = Math.floor(totalSeconds / 60) % 60;
    const h = Math.floor(totalSeconds / 3600);
    return `${h}:${pad2(m)}:${pad2(s)}.${pad2(cs)}`;
}

function pad2(n: number): string {
    return n.toString().padStart(2, '0');
}

/** Line breaks would split a Dialogue record, so they become plain spaces. */
export function normalizeCaptionText(text: string): string {
    return text.replace(/\r\n|\r|\n/g, ' ');
}

// `{...}` starts an override block and a backslash starts a tag in ASS.
export function escapeAssText(text: string): string {
    return text
        .replace(/\\/g, '⧵')
        .replace(/\{/g, '｛')
        .replace(/\}/g, '｝');
}

function styleRecord(style: CaptionStyle): string {
    const fields = [
        'Default', style.fontName, style.fontSize, style.primaryColour, style.secondaryColour,
        style.outlineColour, style.backColour,
        0, 0, 0, 0, 100, 100, 0, 0,
        style.borderStyle, style.outline, style.shadow, style.alignment,
        style.marginL, style.marginR, style.marginV, 1
    ];
    return `Style: ${fields.join(',')}`;
}

export interface CaptionDocumentOptions {
    canvas?: FrameSize;
    style?: CaptionStyle;
    title?: string;
}

export function buildCaptionDocument(track: CaptionTrack, options: CaptionDocumentOptions = {}): string {
    const canvas = options.canvas ?? VERTICAL_1080P.output;
    const style = options.style ?? VERTICAL_1080P.caption;

    const header = [
        '[Script Info]',
        '; Script generated by slidereel',
        `Title: ${options.title ?? 'Subtitle'}`,
        'ScriptType: v4.00+',
        `PlayResX: ${canvas.width}`,
        `PlayResY: ${canvas.height}`,
        'ScaledBorderAndShadow: yes',
        '',
        '[V4+ Styles]',
        `Format: ${STYLE_FORMAT.join(', ')}`,
        styleRecord(style),
        '',
        '[Events]',
        `Format: ${EVENT_FORMAT.join(', ')}`
    ];

    const events = track.pages.map((page) => {
        const text = page.lines.map(escapeAssText).join(ASS_LINE_BREAK);
        const start = formatAssTime(page.start);
        const end = formatAssTime(page.end);
        return `Dialogue: 0,${start},${end},Default,,${style.marginL},${style.marginR},${style.marginV},,${text}`;
    });

    return [...header, ...events].join('\n') + '\n';
}

export interface CaptionBuildOptions extends CaptionDocumentOptions {
    maxWidth?: number;
    linesPerPage?: number;
}

export interface BuiltCaptions {
    track: CaptionTrack;
    document: string;
}

/** wrap -> paginate -> allocate -> serialize for one slide. */
export function buildCaptions(text: string, duration: number, options: CaptionBuildOptions = {}): BuiltCaptions {
    const lines = wrap(normalizeCaptionText(text), options.maxWidth ?? VERTICAL_1080P.captionMaxWidth);
    const pages = paginate(lines, options.linesPerPage ?? VERTICAL_1080P.captionLinesPerPage);
    const track = allocateDurations(pages, duration);
    return { track, document: buildCaptionDocument(track, options) };
}
