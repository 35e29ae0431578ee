import type { WordSource } from './types.js';
import { SecretWord } from './secretWord.js';

/** Folds a date key into an unsigned 32-bit seed (djb2, xor variant) */
function seedFromDateKey(dateKey: string): number {
    let seed = 5381;
    for (const unit of dateKey) {
        seed = ((seed << 5) + seed) ^ unit.charCodeAt(0);
    }
    return seed >>> 0;
}

/**
 * Mulberry32 - a small seeded PRNG.
 * Produces the same sequence in [0, 1) for the same seed.
 */
export function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Formats a date as a YYYY-MM-DD key in local time
 */
export function getDateKey(date: Date = new Date()): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Gets the deterministic daily word for a date key.
 * Same dateKey always yields the same word from the same list.
 */
export function getDailyWord(words: readonly string[], dateKey: string): string {
    if (words.length === 0) {
        throw new Error('Word list is empty');
    }
    const random = mulberry32(seedFromDateKey(dateKey));
    return words[Math.floor(random() * words.length)];
}

/**
 * Hands out the word of the day: every game started on the same date gets the same secret
 */
export class DailyWordSource implements WordSource {
    constructor(
        private readonly words: readonly string[],
        private readonly dateKey: string = getDateKey(),
    ) {
        if (words.length === 0) {
            throw new Error('Word list is empty');
        }
    }

    next(): SecretWord {
        return SecretWord.from(getDailyWord(this.words, this.dateKey));
    }
}
