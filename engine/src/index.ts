// Types
export type {
    LetterResult,
    FeedbackSequence,
    ScoringMode,
    GameStatus,
    GameState,
    GameConfig,
    GuessValidation,
    WordSource,
} from './types.js';

// Secret word
export { SecretWord, WORD_LENGTH } from './secretWord.js';
export type { SecretWordResult } from './secretWord.js';

// Errors
export { InvalidWordLengthError, isInvalidWordLength } from './errors.js';

// Evaluator
export { evaluateGuess, fullMatch } from './evaluator.js';

// Game logic
export {
    DEFAULT_MAX_ATTEMPTS,
    createGame,
    normalizeGuess,
    validateGuess,
    submitGuess,
    getRemainingAttempts,
    abandonGame,
    isGameOver,
    computeKeyboardMap,
} from './game.js';

// Word sources
export {
    DEFAULT_WORDS_FILE,
    parseWordList,
    loadWordList,
    RandomWordSource,
    FixedWordSource,
} from './words.js';

// Daily
export { DailyWordSource, getDailyWord, getDateKey, mulberry32 } from './daily.js';
