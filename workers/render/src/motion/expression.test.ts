import {
    buildZoompanFilter,
    compileExpression,
    compileSegments,
    evaluateSegments,
    formatNumber,
    serializeExpression
} from './expression';
import { generateMotion, type Keyframe } from './keyframes';
import { seededRandom } from './random';

const OUTPUT = { width: 1080, height: 1920 };

/**
 * Evaluates the subset of ffmpeg expression syntax the compiler emits:
 * numbers, `on`, + - * /, parentheses, if(c,a,b) and between(x,lo,hi).
 */
function evaluateFfmpegExpression(source: string, on: number): number {
    let pos = 0;

    const peek = () => source[pos];
    const consume = (ch: string) => {
        if (source[pos] !== ch) throw new Error(`expected ${ch} at ${pos} in ${source}`);
        pos++;
    };

    const parseArgs = (): number[] => {
        consume('(');
        const args = [parseSum()];
        while (peek() === ',') {
            pos++;
            args.push(parseSum());
        }
        consume(')');
        return args;
    };

    const parseAtom = (): number => {
        if (peek() === '(') {
            pos++;
            const value = parseSum();
            consume(')');
            return value;
        }
        const ident = /^[a-z]+/.exec(source.slice(pos));
        if (ident) {
            pos += ident[0].length;
            if (ident[0] === 'on') return on;
            const args = parseArgs();
            if (ident[0] === 'if') return args[0] !== 0 ? args[1] : args[2];
            if (ident[0] === 'between') return args[0] >= args[1] && args[0] <= args[2] ? 1 : 0;
            throw new Error(`unknown function ${ident[0]}`);
        }
        const num = /^\d+(\.\d+)?/.exec(source.slice(pos));
        if (!num) throw new Error(`unexpected input at ${pos} in ${source}`);
        pos += num[0].length;
        return Number(num[0]);
    };

    const parseProduct = (): number => {
        let value = parseAtom();
        while (peek() === '*' || peek() === '/') {
            const op = source[pos++];
            const rhs = parseAtom();
            value = op === '*' ? value * rhs : value / rhs;
        }
        return value;
    };

    function parseSum(): number {
        let value = parseProduct();
        while (peek() === '+' || peek() === '-') {
            const op = source[pos++];
            const rhs = parseProduct();
            value = op === '+' ? value + rhs : value - rhs;
        }
        return value;
    }

    const result = parseSum();
    if (pos !== source.length) throw new Error(`trailing input at ${pos} in ${source}`);
    return result;
}

const twoKeyframes: Keyframe[] = [
    { frame: 0, zoom: 1, x: 0, y: 0 },
    { frame: 125, zoom: 1.2, x: 180, y: 320 }
];

const threeKeyframes: Keyframe[] = [
    { frame: 0, zoom: 1, x: 0, y: 0 },
    { frame: 50, zoom: 1.1, x: 100, y: 200 },
    { frame: 100, zoom: 1.2, x: 50, y: 400 }
];

describe('expression', () => {
    describe('compileSegments', () => {
        it('turns consecutive keyframes into segments', () => {
            expect(compileSegments(threeKeyframes, 'x')).toEqual([
                { startFrame: 0, endFrame: 50, from: 0, to: 100 },
                { startFrame: 50, endFrame: 100, from: 100, to: 50 }
            ]);
        });

        it('needs at least two strictly increasing keyframes', () => {
            expect(() => compileSegments(twoKeyframes.slice(0, 1), 'zoom')).toThrow(RangeError);
            expect(() => compileSegments([twoKeyframes[0], { ...twoKeyframes[1], frame: 0 }], 'zoom')).toThrow(RangeError);
        });
    });

    describe('evaluateSegments', () => {
        const segments = compileSegments(threeKeyframes, 'zoom');

        it('hits the keyframe values at the ends and the joins', () => {
            expect(evaluateSegments(segments, 0)).toBe(1);
            expect(evaluateSegments(segments, 50)).toBeCloseTo(1.1, 12);
            expect(evaluateSegments(segments, 100)).toBe(1.2);
        });

        it('interpolates linearly inside a segment', () => {
            expect(evaluateSegments(segments, 25)).toBeCloseTo(1.05, 12);
            expect(evaluateSegments(segments, 75)).toBeCloseTo(1.15, 12);
        });

        it('clamps outside the keyframe range', () => {
            expect(evaluateSegments(segments, -10)).toBe(1);
            expect(evaluateSegments(segments, 500)).toBe(1.2);
        });
    });

    describe('serializeExpression', () => {
        it('writes a single linear formula for two keyframes', () => {
            expect(compileExpression(twoKeyframes, 'zoom')).toBe('1+(1.2-1)*on/125');
            expect(compileExpression(twoKeyframes, 'x')).toBe('0+(180-0)*on/125');
        });

        it('nests one conditional per extra segment', () => {
            expect(compileExpression(threeKeyframes, 'zoom')).toBe(
                'if(between(on,0,50),1+(1.1-1)*on/50,1.1+(1.2-1.1)*(on-50)/50)'
            );
        });

        it('rejects an empty segment list', () => {
            expect(() => serializeExpression([])).toThrow(RangeError);
        });

        it('agrees with the reference evaluation at every frame', () => {
            const random = seededRandom(11);
            for (let run = 0; run < 50; run++) {
                const plan = generateMotion({
                    duration: 1 + random.next() * 6,
                    intensity: random.next(),
                    fps: 25,
                    width: 2160,
                    height: 3840,
                    frequency: run % 2 === 0 ? 0 : 1,
                    random
                });
                if (plan.kind !== 'animated') continue;

                for (const attribute of ['zoom', 'x', 'y'] as const) {
                    const segments = compileSegments(plan.keyframes, attribute);
                    const expr = serializeExpression(segments);
                    const first = plan.keyframes[0][attribute];
                    const last = plan.keyframes[plan.keyframes.length - 1][attribute];

                    expect(evaluateFfmpegExpression(expr, 0)).toBeCloseTo(first, 9);
                    expect(evaluateFfmpegExpression(expr, plan.totalFrames)).toBeCloseTo(last, 9);
                    for (let on = 0; on <= plan.totalFrames; on += 7) {
                        expect(evaluateFfmpegExpression(expr, on)).toBeCloseTo(evaluateSegments(segments, on), 9);
                    }
                }
            }
        });
    });

    it('formats numbers without exponent notation', () => {
        expect(formatNumber(1.25)).toBe('1.25');
        expect(formatNumber(-0)).toBe('0');
        expect(formatNumber(1e-7)).toBe('0.0000001');
        expect(formatNumber(1e-14)).toBe('0');
    });

    describe('buildZoompanFilter', () => {
        it('embeds the three expressions, the duration and the output size', () => {
            const filter = buildZoompanFilter({ kind: 'animated', pattern: 'zoom-in', totalFrames: 125, keyframes: twoKeyframes }, 25, OUTPUT);
            expect(filter).toBe(
                "zoompan=z='1+(1.2-1)*on/125':x='0+(180-0)*on/125':y='0+(320-0)*on/125':d=125:s=1080x1920:fps=25"
            );
        });

        it('uses the conditional form for multi-keyframe plans', () => {
            const filter = buildZoompanFilter({ kind: 'animated', pattern: 'pan', totalFrames: 100, keyframes: threeKeyframes }, 25, OUTPUT);
            expect(filter.startsWith("zoompan=z='if(between(on,0,50),")).toBe(true);
            expect(filter).toContain(":x='if(between(on,0,50),");
            expect(filter).toContain(":y='if(between(on,0,50),");
            expect(filter.endsWith(':d=100:s=1080x1920:fps=25')).toBe(true);
        });

        it('scales without motion for a static plan', () => {
            expect(buildZoompanFilter({ kind: 'static', totalFrames: 0 }, 25, OUTPUT)).toBe('scale=1080:1920');
        });
    });
});
