import { describe, it, expect } from 'vitest';
import {
    createGame,
    normalizeGuess,
    validateGuess,
    submitGuess,
    getRemainingAttempts,
    isGameOver,
    abandonGame,
    computeKeyboardMap,
} from '../src/game.js';
import { SecretWord } from '../src/secretWord.js';
import { InvalidWordLengthError } from '../src/errors.js';

const secret = SecretWord.from('bathe');

describe('createGame', () => {
    it('initializes with default max attempts of 6', () => {
        const game = createGame({ secret });

        expect(game.maxAttempts).toBe(6);
        expect(game.scoring).toBe('uncapped');
    });

    it('allows custom max attempts and scoring', () => {
        const game = createGame({ secret, maxAttempts: 3, scoring: 'counted' });

        expect(game.maxAttempts).toBe(3);
        expect(game.scoring).toBe('counted');
    });

    it('starts with empty state', () => {
        const game = createGame({ secret });

        expect(game.guesses).toEqual([]);
        expect(game.results).toEqual([]);
        expect(game.attempts).toBe(0);
        expect(game.status).toBe('playing');
    });

    it('rejects a non-positive attempt budget', () => {
        expect(() => createGame({ secret, maxAttempts: 0 })).toThrow(RangeError);
        expect(() => createGame({ secret, maxAttempts: 2.5 })).toThrow(RangeError);
    });
});

describe('normalizeGuess', () => {
    it('trims and lowercases', () => {
        expect(normalizeGuess('  BrAiD \n')).toBe('braid');
    });
});

describe('validateGuess', () => {
    it('accepts valid 5-letter words', () => {
        expect(validateGuess('crane')).toEqual({ valid: true });
    });

    it('rejects wrong length with InvalidWordLengthError', () => {
        const validation = validateGuess('cran');
        expect(validation.valid).toBe(false);
        if (!validation.valid) {
            expect(validation.error).toBeInstanceOf(InvalidWordLengthError);
            expect(validation.error.message).toBe('Word must be exactly 5 characters long, got 4');
        }
        expect(validateGuess('cranes').valid).toBe(false);
        expect(validateGuess('').valid).toBe(false);
    });

    it('rejects non-letter characters', () => {
        const validation = validateGuess('cr4ne');
        expect(validation.valid).toBe(false);
        if (!validation.valid) {
            expect(validation.error.message).toBe('Guess must contain only letters');
        }
        expect(validateGuess('cr ne').valid).toBe(false);
    });
});

describe('submitGuess', () => {
    it('records the normalized guess and its feedback', () => {
        const game = submitGuess(createGame({ secret }), '  BRAID ');

        expect(game.guesses).toEqual(['braid']);
        expect(game.results).toEqual([['matched', 'absent', 'present', 'absent', 'absent']]);
        expect(game.attempts).toBe(1);
        expect(game.status).toBe('playing');
    });

    it('does not consume an attempt for an invalid guess', () => {
        const game = createGame({ secret });

        expect(submitGuess(game, 'brai')).toBe(game);
        expect(submitGuess(game, 'br4id')).toBe(game);
    });

    it('wins on a full match', () => {
        let game = createGame({ secret });
        game = submitGuess(game, 'braid');
        game = submitGuess(game, 'bathe');

        expect(game.status).toBe('won');
        expect(game.attempts).toBe(2);
        expect(isGameOver(game)).toBe(true);
    });

    it('loses when out of attempts', () => {
        let game = createGame({ secret, maxAttempts: 2 });
        game = submitGuess(game, 'braid');
        game = submitGuess(game, 'crane');

        expect(game.status).toBe('lost');
        expect(isGameOver(game)).toBe(true);
    });

    it('wins on the final attempt', () => {
        let game = createGame({ secret, maxAttempts: 2 });
        game = submitGuess(game, 'braid');
        game = submitGuess(game, 'bathe');

        expect(game.status).toBe('won');
    });

    it('ignores guesses after game over', () => {
        let game = createGame({ secret });
        game = submitGuess(game, 'bathe');

        expect(submitGuess(game, 'braid')).toBe(game);
    });

    it('scores with the configured mode', () => {
        const game = submitGuess(createGame({ secret: SecretWord.from('plate'), scoring: 'counted' }), 'llama');

        expect(game.results[0]).toEqual(['absent', 'matched', 'matched', 'absent', 'absent']);
    });
});

describe('getRemainingAttempts', () => {
    it('returns correct remaining count', () => {
        let game = createGame({ secret });
        expect(getRemainingAttempts(game)).toBe(6);

        game = submitGuess(game, 'braid');
        game = submitGuess(game, 'crane');
        expect(getRemainingAttempts(game)).toBe(4);
    });
});

describe('abandonGame', () => {
    it('loses a game in progress', () => {
        const game = abandonGame(submitGuess(createGame({ secret }), 'braid'));

        expect(game.status).toBe('lost');
        expect(game.attempts).toBe(1);
    });

    it('leaves a finished game alone', () => {
        const game = submitGuess(createGame({ secret }), 'bathe');

        expect(abandonGame(game)).toBe(game);
    });
});

describe('computeKeyboardMap', () => {
    it('returns empty map before any guess', () => {
        expect(computeKeyboardMap(createGame({ secret }))).toEqual({});
    });

    it('keeps the best status seen for each letter', () => {
        let game = createGame({ secret });
        game = submitGuess(game, 'braid');
        game = submitGuess(game, 'tabby');

        expect(computeKeyboardMap(game)).toEqual({
            b: 'matched',
            r: 'absent',
            a: 'matched',
            i: 'absent',
            d: 'absent',
            t: 'present',
            y: 'absent',
        });
    });
});
