import type { GameConfig, GameState, GuessValidation, LetterResult } from './types.js';
import { evaluateGuess, fullMatch } from './evaluator.js';
import { WORD_LENGTH } from './secretWord.js';
import { InvalidWordLengthError } from './errors.js';

export const DEFAULT_MAX_ATTEMPTS = 6;

const LETTERS_ONLY = /^\p{L}+$/u;

/**
 * Creates a new game state around a secret word
 */
export function createGame(config: GameConfig): GameState {
    const { secret, maxAttempts = DEFAULT_MAX_ATTEMPTS, scoring = 'uncapped' } = config;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    return {
        secret,
        guesses: [],
        results: [],
        attempts: 0,
        maxAttempts,
        scoring,
        status: 'playing',
    };
}

/**
 * Trims surrounding whitespace and lowercases raw input
 */
export function normalizeGuess(raw: string): string {
    return raw.trim().toLowerCase();
}

/**
 * Validates a normalized guess before submission
 */
export function validateGuess(guess: string): GuessValidation {
    const length = Array.from(guess).length;
    if (length !== WORD_LENGTH) {
        return { valid: false, error: new InvalidWordLengthError(length, WORD_LENGTH) };
    }

    if (!LETTERS_ONLY.test(guess)) {
        return { valid: false, error: new Error('Guess must contain only letters') };
    }

    return { valid: true };
}

/**
 * Submits a guess and returns the updated game state.
 * This is a pure function - it returns a new state object.
 * Invalid guesses and guesses after the game is over leave the state untouched.
 */
export function submitGuess(state: GameState, guess: string): GameState {
    if (state.status !== 'playing') {
        return state;
    }

    const normalized = normalizeGuess(guess);
    if (!validateGuess(normalized).valid) {
        return state;
    }

    const result = evaluateGuess(state.secret, normalized, state.scoring);
    const attempts = state.attempts + 1;
    const won = fullMatch(result);

    return {
        ...state,
        guesses: [...state.guesses, normalized],
        results: [...state.results, result],
        attempts,
        status: won ? 'won' : attempts >= state.maxAttempts ? 'lost' : 'playing',
    };
}

/**
 * Gets the number of remaining attempts
 */
export function getRemainingAttempts(state: GameState): number {
    return state.maxAttempts - state.attempts;
}

/**
 * Ends a game the player walked away from. A finished game is returned as is.
 */
export function abandonGame(state: GameState): GameState {
    if (state.status !== 'playing') {
        return state;
    }
    return { ...state, status: 'lost' };
}

export function isGameOver(state: GameState): boolean {
    return state.status !== 'playing';
}

/**
 * Computes keyboard letter statuses from every scored guess.
 * Each guessed letter gets its best status using precedence: matched > present > absent.
 * Letters never guessed have no entry.
 */
export function computeKeyboardMap(state: GameState): Record<string, LetterResult> {
    const statuses: Record<string, LetterResult> = {};

    state.guesses.forEach((guess, guessIdx) => {
        const result = state.results[guessIdx];
        Array.from(guess).forEach((letter, letterIdx) => {
            const tileStatus = result[letterIdx];

            if (tileStatus === 'matched') {
                statuses[letter] = 'matched';
            } else if (tileStatus === 'present' && statuses[letter] !== 'matched') {
                statuses[letter] = 'present';
            } else if (tileStatus === 'absent' && !statuses[letter]) {
                statuses[letter] = 'absent';
            }
        });
    });

    return statuses;
}
