import { readFileSync } from 'node:fs';
import type { WordSource } from './types.js';
import { SecretWord, WORD_LENGTH } from './secretWord.js';

/** Answer list bundled with the engine, one word per line */
export const DEFAULT_WORDS_FILE = new URL('../data/answers.txt', import.meta.url);

/**
 * Parses a newline-separated word list.
 * Keeps only lowercase words of exactly WORD_LENGTH characters.
 */
export function parseWordList(text: string): string[] {
    return text
        .split('\n')
        .map(w => w.trim().toLowerCase())
        .filter(w => Array.from(w).length === WORD_LENGTH);
}

/**
 * Reads and parses a word list file (the bundled list by default).
 * Throws if nothing usable is left after filtering.
 */
export function loadWordList(path: string | URL = DEFAULT_WORDS_FILE): string[] {
    const words = parseWordList(readFileSync(path, 'utf8'));
    if (words.length === 0) {
        throw new Error(`Word list is empty: ${String(path)}`);
    }
    return words;
}

/**
 * Picks a uniformly random word from a list for every new game
 */
export class RandomWordSource implements WordSource {
    constructor(
        private readonly words: readonly string[],
        private readonly random: () => number = Math.random,
    ) {
        if (words.length === 0) {
            throw new Error('Word list is empty');
        }
    }

    next(): SecretWord {
        const index = Math.floor(this.random() * this.words.length);
        return SecretWord.from(this.words[index]);
    }
}

/** Always hands out the same word */
export class FixedWordSource implements WordSource {
    private readonly secret: SecretWord;

    constructor(word: string) {
        this.secret = SecretWord.from(word);
    }

    next(): SecretWord {
        return this.secret;
    }
}
