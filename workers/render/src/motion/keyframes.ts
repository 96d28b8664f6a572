import { mathRandom, pick, uniform, uniformUpTo, type RandomSource } from './random';

export type MotionPattern = 'zoom-in' | 'zoom-out' | 'pan';

export const MOTION_PATTERNS: readonly MotionPattern[] = ['zoom-in', 'zoom-out', 'pan'];

export interface Keyframe {
    frame: number;
    zoom: number;
    x: number; // left edge of the crop window, source pixels
    y: number; // top edge of the crop window, source pixels
}

export type MotionPlan =
    | { kind: 'static'; totalFrames: number }
    | { kind: 'animated'; pattern: MotionPattern; totalFrames: number; keyframes: Keyframe[] };

export interface MotionOptions {
    duration: number; // seconds
    intensity: number; // 0..1
    fps: number;
    width: number; // source (zoompan input) size
    height: number;
    random?: RandomSource;
    /** Keyframe segments per second; 0 keeps a single start/end move. */
    frequency?: number;
    /** max zoom = 1 + maxZoomSpan * intensity */
    maxZoomSpan?: number;
    /** Forces a pattern instead of drawing one. */
    pattern?: MotionPattern;
}

export const DEFAULT_MAX_ZOOM_SPAN = 0.5;
const ZOOM_MIN_STEP = 0.1;
const PAN_MIN_STEP = 0.2;

export function totalFramesFor(duration: number, fps: number): number {
    if (!Number.isFinite(duration) || !Number.isFinite(fps)) return 0;
    return Math.round(duration * fps);
}

export function maxZoomFor(intensity: number, maxZoomSpan: number = DEFAULT_MAX_ZOOM_SPAN): number {
    const clamped = Math.min(1, Math.max(0, Number.isFinite(intensity) ? intensity : 0));
    return 1 + maxZoomSpan * clamped;
}

/** Largest legal crop offset along one axis at the given zoom. */
export function maxOffset(dimension: number, zoom: number): number {
    return dimension * (1 - 1 / zoom);
}

function centeredOffset(dimension: number, zoom: number): number {
    return maxOffset(dimension, zoom) / 2;
}

export function segmentCount(duration: number, frequency: number, totalFrames: number): number {
    const wanted = frequency > 0 ? Math.max(1, Math.round(duration * frequency)) : 1;
    return Math.max(1, Math.min(wanted, totalFrames));
}

// Evenly spaced and strictly increasing as long as segments <= totalFrames.
function keyframeFrames(totalFrames: number, segments: number): number[] {
    const frames: number[] = [];
    for (let i = 0; i <= segments; i++) {
        frames.push(Math.round((i * totalFrames) / segments));
    }
    return frames;
}

function centeredKeyframe(frame: number, zoom: number, width: number, height: number): Keyframe {
    return {
        frame,
        zoom,
        x: centeredOffset(width, zoom),
        y: centeredOffset(height, zoom)
    };
}

export function generateMotion(options: MotionOptions): MotionPlan {
    const { duration, fps, width, height } = options;
    const random = options.random ?? mathRandom;
    const totalFrames = totalFramesFor(duration, fps);

    if (totalFrames <= 0) {
        return { kind: 'static', totalFrames: 0 };
    }

    const pattern = options.pattern ?? pick(random, MOTION_PATTERNS);
    const maxZoom = maxZoomFor(options.intensity, options.maxZoomSpan);
    const segments = segmentCount(duration, options.frequency ?? 0, totalFrames);
    const frames = keyframeFrames(totalFrames, segments);

    let keyframes: Keyframe[];

    if (pattern === 'pan') {
        // Constant scale, the crop window drifts between random legal positions
        const zoom = uniformUpTo(random, 1 + PAN_MIN_STEP, maxZoom);
        const rangeX = maxOffset(width, zoom);
        const rangeY = maxOffset(height, zoom);
        keyframes = frames.map((frame) => ({
            frame,
            zoom,
            x: uniform(random, 0, rangeX),
            y: uniform(random, 0, rangeY)
        }));
    } else {
        const targets: number[] = [];
        for (let i = 0; i < segments; i++) {
            targets.push(uniformUpTo(random, 1 + ZOOM_MIN_STEP, maxZoom));
        }
        targets.sort((a, b) => a - b);

        // zoom-in starts on the full frame, zoom-out ends on it
        const zooms = pattern === 'zoom-in' ? [1, ...targets] : [...targets.reverse(), 1];
        keyframes = frames.map((frame, i) => centeredKeyframe(frame, zooms[i], width, height));
    }

    return { kind: 'animated', pattern, totalFrames, keyframes };
}
