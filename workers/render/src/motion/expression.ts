import type { FrameSize } from '@slidereel/shared';
import type { Keyframe, MotionPlan } from './keyframes';

export type MotionAttribute = 'zoom' | 'x' | 'y';

/** Linear move of one attribute between two consecutive keyframes. */
export interface InterpolationSegment {
    startFrame: number;
    endFrame: number;
    from: number;
    to: number;
}

export function compileSegments(keyframes: readonly Keyframe[], attribute: MotionAttribute): InterpolationSegment[] {
    if (keyframes.length < 2) {
        throw new RangeError(`At least two keyframes are required, got ${keyframes.length}`);
    }

    const segments: InterpolationSegment[] = [];
    for (let i = 1; i < keyframes.length; i++) {
        const a = keyframes[i - 1];
        const b = keyframes[i];
        if (!(b.frame > a.frame)) {
            throw new RangeError(`Keyframe frames must strictly increase (${a.frame} then ${b.frame})`);
        }
        segments.push({ startFrame: a.frame, endFrame: b.frame, from: a[attribute], to: b[attribute] });
    }
    return segments;
}

function interpolate(segment: InterpolationSegment, on: number): number {
    const span = segment.endFrame - segment.startFrame;
    return segment.from + ((segment.to - segment.from) * (on - segment.startFrame)) / span;
}

/** Reference evaluation of the IR; frames outside the keyframe range clamp to the ends. */
export function evaluateSegments(segments: readonly InterpolationSegment[], on: number): number {
    if (segments.length === 0) {
        throw new RangeError('No segments to evaluate');
    }
    const first = segments[0];
    const last = segments[segments.length - 1];
    if (on <= first.startFrame) return first.from;
    if (on >= last.endFrame) return last.to;

    const segment = segments.find((s) => on >= s.startFrame && on <= s.endFrame) ?? last;
    return interpolate(segment, on);
}

/** Plain decimal text, never exponent notation. */
export function formatNumber(value: number): string {
    if (Object.is(value, -0)) return '0';
    const text = String(value);
    if (!text.includes('e')) return text;
    return value.toFixed(12).replace(/\.?0+$/, '');
}

function segmentFormula(segment: InterpolationSegment): string {
    const from = formatNumber(segment.from);
    const to = formatNumber(segment.to);
    const progress = segment.startFrame === 0
        ? `on/${segment.endFrame}`
        : `(on-${segment.startFrame})/${segment.endFrame - segment.startFrame}`;
    return `${from}+(${to}-${from})*${progress}`;
}

/**
 * Serializes the IR into ffmpeg expression syntax over the output frame counter `on`.
 * A single segment is one linear formula; more become a nested `if(between(...))` chain.
 */
export function serializeExpression(segments: readonly InterpolationSegment[]): string {
    if (segments.length === 0) {
        throw new RangeError('No segments to serialize');
    }

    let expr = segmentFormula(segments[segments.length - 1]);
    for (let i = segments.length - 2; i >= 0; i--) {
        const s = segments[i];
        expr = `if(between(on,${s.startFrame},${s.endFrame}),${segmentFormula(s)},${expr})`;
    }
    return expr;
}

export function compileExpression(keyframes: readonly Keyframe[], attribute: MotionAttribute): string {
    return serializeExpression(compileSegments(keyframes, attribute));
}

export function buildZoompanFilter(plan: MotionPlan, fps: number, output: FrameSize): string {
    if (plan.kind === 'static') {
        return `scale=${output.width}:${output.height}`;
    }

    const z = compileExpression(plan.keyframes, 'zoom');
    const x = compileExpression(plan.keyframes, 'x');
    const y = compileExpression(plan.keyframes, 'y');
    return `zoompan=z='${z}':x='${x}':y='${y}':d=${plan.totalFrames}:s=${output.width}x${output.height}:fps=${fps}`;
}
