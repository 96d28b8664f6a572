export const NARROW_WEIGHT = 0.5;
export const WIDE_WEIGHT = 1.0;

// Anything past basic Latin (CJK, kana, full-width punctuation, accented Latin) counts as wide.
const BASIC_LATIN_MAX = 127;

/** Display-width weight of a single character (one code point). */
export function weigh(char: string): number {
    const codePoint = char.codePointAt(0) ?? 0;
    return codePoint > BASIC_LATIN_MAX ? WIDE_WEIGHT : NARROW_WEIGHT;
}

export function measure(text: string): number {
    let total = 0;
    for (const char of text) {
        total += weigh(char);
    }
    return total;
}

/**
 * Greedy line wrapping under a width budget expressed in wide-character units.
 * A character that alone exceeds `maxWidth` still gets a line of its own.
 */
export function wrap(text: string, maxWidth: number): string[] {
    const lines: string[] = [];
    let current = '';
    let currentWidth = 0;

    for (const char of text) {
        const width = weigh(char);
        if (currentWidth + width > maxWidth && current.length > 0) {
            lines.push(current);
            current = char;
            currentWidth = width;
        } else {
            current += char;
            currentWidth += width;
        }
    }

    if (current.length > 0) {
        lines.push(current);
    }
    return lines;
}
