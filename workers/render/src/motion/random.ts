/** Uniform source in [0, 1). Injected so motion choices can be reproduced in tests. */
export interface RandomSource {
    next(): number;
}

export const mathRandom: RandomSource = {
    next: () => Math.random()
};

/** mulberry32: small 32-bit seeded generator. */
export function seededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return {
        next() {
            state = (state + 0x6d2b79f5) >>> 0;
            let t = state;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        }
    };
}

/** Uniform in (low, high]; collapses to `high` when the range is empty. */
export function uniformUpTo(random: RandomSource, low: number, high: number): number {
    if (high <= low) return high;
    return high - (high - low) * random.next();
}

/** Uniform in [low, high]. */
export function uniform(random: RandomSource, low: number, high: number): number {
    if (high <= low) return low;
    return Math.min(high, low + (high - low) * random.next());
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
    if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
    }
    const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
    return items[index];
}
