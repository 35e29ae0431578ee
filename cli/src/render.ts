import chalk, { type ChalkInstance } from 'chalk';
import { WORD_LENGTH, type FeedbackSequence, type LetterResult } from '@termle/engine';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

function styleLetter(letter: string, result: LetterResult, colors: ChalkInstance): string {
    switch (result) {
        case 'matched':
            return colors.green.bold(letter);
        case 'present':
            return colors.yellow.bold(letter);
        case 'absent':
            return letter;
    }
}

export function renderWelcome(): string {
    return 'Welcome to termle!';
}

/** Empty row shown before the first guess: `_ _ _ _ _` */
export function renderPlaceholder(): string {
    return new Array<string>(WORD_LENGTH).fill('_').join(' ');
}

/**
 * Renders a scored guess as space-separated letters:
 * matched green, present yellow, absent unstyled.
 */
export function renderGuess(guess: string, feedback: FeedbackSequence, colors: ChalkInstance = chalk): string {
    return Array.from(guess)
        .map((letter, i) => styleLetter(letter, feedback[i] ?? 'absent', colors))
        .join(' ');
}

/**
 * Renders the alphabet with what is known about each letter.
 * Letters ruled out are replaced by a dot; untried letters stay plain.
 */
export function renderKeyboard(statuses: Record<string, LetterResult>, colors: ChalkInstance = chalk): string {
    return Array.from(ALPHABET)
        .map((letter) => {
            const status = statuses[letter];
            if (!status) return letter;
            if (status === 'absent') return colors.dim('·');
            return styleLetter(letter, status, colors);
        })
        .join('');
}

export function renderRemaining(remaining: number): string {
    return `(${remaining} left)`;
}

export function renderLengthHint(): string {
    return `You'll need ${WORD_LENGTH} letters to make it work!`;
}

export function renderWin(attempts: number, colors: ChalkInstance = chalk): string {
    return `${colors.green('You won!')} You needed ${attempts} attempt${attempts === 1 ? '' : 's'}`;
}

export function renderLoss(secret: string, colors: ChalkInstance = chalk): string {
    return `${colors.red('You lost :(')} The word was '${secret}'`;
}
