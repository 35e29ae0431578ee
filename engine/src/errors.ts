/**
 * Raised when a secret word or a guess does not have the required number of characters.
 * Always recoverable: the caller rejects the input and asks for another one.
 */
export class InvalidWordLengthError extends Error {
    readonly code = 'INVALID_WORD_LENGTH';

    constructor(
        readonly actual: number,
        readonly expected: number,
    ) {
        super(`Word must be exactly ${expected} characters long, got ${actual}`);
        this.name = 'InvalidWordLengthError';
    }
}

export function isInvalidWordLength(error: unknown): error is InvalidWordLengthError {
    return error instanceof InvalidWordLengthError;
}
