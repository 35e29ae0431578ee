import chalk, { type ChalkInstance } from 'chalk';
import {
    abandonGame,
    computeKeyboardMap,
    getRemainingAttempts,
    isGameOver,
    isInvalidWordLength,
    normalizeGuess,
    submitGuess,
    validateGuess,
    type GameState,
} from '@termle/engine';
import {
    renderGuess,
    renderKeyboard,
    renderLengthHint,
    renderLoss,
    renderRemaining,
    renderWin,
} from './render.js';
import type { Logger } from './logger.js';

export interface RunGameOptions {
    state: GameState;
    /** One guess per line */
    input: AsyncIterable<string> | Iterable<string>;
    write: (line: string) => void;
    logger?: Logger;
    colors?: ChalkInstance;
}

function renderOutcome(state: GameState, colors: ChalkInstance): string {
    return state.status === 'won' ? renderWin(state.attempts, colors) : renderLoss(state.secret.reveal(), colors);
}

/**
 * Reads guesses until the word is found or the attempts run out.
 * Rejected input is reported and costs no attempt. Running out of input counts as a loss.
 * A game that is already over is announced without reading any input.
 * Resolves with the final game state.
 */
export async function runGame(options: RunGameOptions): Promise<GameState> {
    const { input, write, logger, colors = chalk } = options;
    let state = options.state;

    if (isGameOver(state)) {
        write(renderOutcome(state, colors));
        return state;
    }

    for await (const line of input) {
        const guess = normalizeGuess(line);
        const validation = validateGuess(guess);
        if (!validation.valid) {
            logger?.debug(`rejected guess '${guess}': ${validation.error.message}`);
            write(isInvalidWordLength(validation.error) ? renderLengthHint() : validation.error.message);
            continue;
        }

        state = submitGuess(state, guess);
        const feedback = state.results[state.results.length - 1];

        if (state.status !== 'won') {
            write(`${renderGuess(guess, feedback, colors)}  ${renderRemaining(getRemainingAttempts(state))}`);
            write(renderKeyboard(computeKeyboardMap(state), colors));
        }

        if (isGameOver(state)) {
            write(renderOutcome(state, colors));
            return state;
        }
    }

    logger?.debug('input closed before the game ended');
    state = abandonGame(state);
    write(renderOutcome(state, colors));
    return state;
}
