import { InvalidWordLengthError } from './errors.js';

/** Number of characters in every secret word and every guess */
export const WORD_LENGTH = 5;

export type SecretWordResult =
    | { ok: true; value: SecretWord }
    | { ok: false; error: InvalidWordLengthError };

/**
 * The word the player is trying to guess.
 *
 * Holds the raw text plus an index from each character to the set of positions
 * it occupies, so scoring can answer "is this letter here?" and "is this letter
 * anywhere?" without rescanning the text.
 */
export class SecretWord {
    readonly text: string;
    readonly positionIndex: ReadonlyMap<string, ReadonlySet<number>>;

    private constructor(text: string, positionIndex: ReadonlyMap<string, ReadonlySet<number>>) {
        this.text = text;
        this.positionIndex = positionIndex;
    }

    /**
     * Builds a secret word, reporting a wrong length as a value instead of throwing.
     * Length is counted in characters (code points), the same units the index uses.
     */
    static parse(raw: string): SecretWordResult {
        const chars = Array.from(raw);
        if (chars.length !== WORD_LENGTH) {
            return { ok: false, error: new InvalidWordLengthError(chars.length, WORD_LENGTH) };
        }

        const index = new Map<string, Set<number>>();
        chars.forEach((char, position) => {
            let positions = index.get(char);
            if (!positions) {
                positions = new Set();
                index.set(char, positions);
            }
            positions.add(position);
        });

        return { ok: true, value: new SecretWord(raw, index) };
    }

    /**
     * Same as {@link SecretWord.parse}, but throws the {@link InvalidWordLengthError}.
     */
    static from(raw: string): SecretWord {
        const result = SecretWord.parse(raw);
        if (!result.ok) {
            throw result.error;
        }
        return result.value;
    }

    isAtPosition(char: string, position: number): boolean {
        return this.positionIndex.get(char)?.has(position) ?? false;
    }

    /** Whether the character occurs anywhere in the word */
    contains(char: string): boolean {
        return this.positionIndex.has(char);
    }

    /** Shows the secret word, e.g. once the game is lost */
    reveal(): string {
        return this.text;
    }
}
