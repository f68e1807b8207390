import { shuffle } from "../random.js";
import type { Random } from "../types.js";

const SCRAMBLE_ATTEMPTS = 10;
const MASK = "_";

/**
 * Shuffles the letters of `word` until the result differs from it
 * (ignoring case). Gives up after a few attempts and returns the word as is.
 */
export function scramble(word: string, rng: Random = Math.random): string {
    const chars = Array.from(word);
    if (chars.length < 2) return word;
    for (let i = 0; i < SCRAMBLE_ATTEMPTS; i++) {
        const candidate = shuffle(chars, rng).join("");
        if (candidate.toLowerCase() !== word.toLowerCase()) return candidate;
    }
    return word;
}

/** `komputer` -> `k______r (8 huruf)` */
export function wordClue(answer: string): string {
    const chars = Array.from(answer);
    if (chars.length <= 2) return answer;
    const first = chars[0];
    const last = chars[chars.length - 1];
    return `${first}${MASK.repeat(chars.length - 2)}${last} (${chars.length} huruf)`;
}

export function imageClue(answer: string): string {
    const chars = Array.from(answer);
    return `diawali huruf **${(chars[0] ?? "").toUpperCase()}**, total **${chars.length}** huruf.`;
}
