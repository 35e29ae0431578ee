import type { FeedbackSequence, LetterResult, ScoringMode } from './types.js';
import { WORD_LENGTH, type SecretWord } from './secretWord.js';

const ALL_MATCHED: FeedbackSequence = Object.freeze(new Array<LetterResult>(WORD_LENGTH).fill('matched'));

/**
 * Evaluates a guess against the secret word.
 * Returns one LetterResult per guess character, in guess order.
 *
 * The caller is expected to have checked the guess length (see `validateGuess`).
 *
 * Algorithm (`uncapped`, the default):
 * 1. An exact match short-circuits to all matched
 * 2. Otherwise each letter is matched if the secret has it at that position,
 *    present if the secret has it anywhere, absent if not at all
 *
 * With `uncapped` scoring a letter repeated in the guess is marked present as many
 * times as it is misplaced, even when the secret holds it fewer times.
 * `counted` scoring limits matched + present marks to the secret's occurrences.
 */
export function evaluateGuess(
    secret: SecretWord,
    guess: string,
    scoring: ScoringMode = 'uncapped',
): FeedbackSequence {
    if (guess === secret.text) {
        return ALL_MATCHED;
    }

    const letters = Array.from(guess);
    return scoring === 'counted' ? evaluateCounted(secret, letters) : evaluateUncapped(secret, letters);
}

function evaluateUncapped(secret: SecretWord, letters: string[]): FeedbackSequence {
    return letters.map((letter, i): LetterResult => {
        if (secret.isAtPosition(letter, i)) return 'matched';
        if (secret.contains(letter)) return 'present';
        return 'absent';
    });
}

function evaluateCounted(secret: SecretWord, letters: string[]): FeedbackSequence {
    const result: LetterResult[] = new Array<LetterResult>(letters.length).fill('absent');
    const remaining = new Map<string, number>();

    for (const [letter, positions] of secret.positionIndex) {
        remaining.set(letter, positions.size);
    }

    // First pass: mark matched letters
    for (let i = 0; i < letters.length; i++) {
        const letter = letters[i];
        if (secret.isAtPosition(letter, i)) {
            result[i] = 'matched';
            remaining.set(letter, (remaining.get(letter) ?? 0) - 1);
        }
    }

    // Second pass: mark present letters while occurrences are left
    for (let i = 0; i < letters.length; i++) {
        if (result[i] === 'matched') continue;

        const letter = letters[i];
        const left = remaining.get(letter) ?? 0;
        if (left > 0) {
            result[i] = 'present';
            remaining.set(letter, left - 1);
        }
    }

    return result;
}

/**
 * Checks if a feedback sequence means the word was guessed (all matched)
 */
export function fullMatch(feedback: FeedbackSequence): boolean {
    return feedback.every((r) => r === 'matched');
}
