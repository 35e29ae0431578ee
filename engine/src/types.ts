import type { SecretWord } from './secretWord.js';

/** Result of evaluating a single letter in a guess */
export type LetterResult = 'matched' | 'present' | 'absent';

/** Result of evaluating a full guess against the secret, in guess order */
export type FeedbackSequence = readonly LetterResult[];

/**
 * How repeated guess letters are scored.
 * - `uncapped`: every misplaced letter that occurs anywhere in the secret is `present`
 * - `counted`: `present` marks are limited by the letter's remaining occurrences
 */
export type ScoringMode = 'uncapped' | 'counted';

/** Lifecycle of a single game session */
export type GameStatus = 'playing' | 'won' | 'lost';

/** State of a single game session */
export interface GameState {
    secret: SecretWord;
    guesses: string[];
    results: FeedbackSequence[];
    attempts: number;
    maxAttempts: number;
    scoring: ScoringMode;
    status: GameStatus;
}

/** Configuration for creating a new game */
export interface GameConfig {
    secret: SecretWord;
    maxAttempts?: number;
    scoring?: ScoringMode;
}

/** Outcome of validating raw guess input */
export type GuessValidation =
    | { valid: true }
    | { valid: false; error: Error };

/** Anything that can hand out a secret word for a new game */
export interface WordSource {
    next(): SecretWord;
}
