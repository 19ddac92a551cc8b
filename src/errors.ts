/**
 * Base error class for codec and card errors
 */
export class CardOsError extends Error {
    readonly code: number;

    constructor(message: string, code: number) {
        super(message);
        this.name = 'CardOsError';
        this.code = code;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Error thrown when a record or length does not fit the remaining buffer capacity
 */
export class CapacityError extends CardOsError {
    constructor(message = 'Buffer too small') {
        super(message, -1303);
        this.name = 'CapacityError';
    }
}

/**
 * Error thrown for out-of-range ids and sizes, malformed key references and unsupported file kinds
 */
export class ArgumentError extends CardOsError {
    constructor(message = 'Invalid arguments') {
        super(message, -1300);
        this.name = 'ArgumentError';
    }
}

/**
 * Error thrown when card metadata uses an encoding this codec does not understand
 */
export class UnsupportedByCardError extends CardOsError {
    constructor(message = 'Not supported by card') {
        super(message, -1408);
        this.name = 'UnsupportedByCardError';
    }
}

/**
 * Error thrown when decoded data is truncated or has trailing bytes
 */
export class LengthError extends CardOsError {
    constructor(message = 'Wrong length') {
        super(message, -1206);
        this.name = 'LengthError';
    }
}

/**
 * Error thrown when a scratch allocation fails
 */
export class OutOfMemoryError extends CardOsError {
    constructor(message = 'Out of memory') {
        super(message, -1404);
        this.name = 'OutOfMemoryError';
    }
}

/**
 * Error thrown when the card reply does not have the expected shape
 */
export class UnexpectedResponseError extends CardOsError {
    constructor(message = 'Unknown data received from card') {
        super(message, -1213);
        this.name = 'UnexpectedResponseError';
    }
}

/**
 * Error thrown when the card answers a command with a status word other than 9000
 */
export class CardStatusError extends CardOsError {
    readonly sw1: number;
    readonly sw2: number;

    constructor(sw1: number, sw2: number, message?: string) {
        const sw = ((sw1 << 8) | sw2).toString(16).padStart(4, '0').toUpperCase();
        super(message ?? `Card returned SW ${sw}`, -1200);
        this.name = 'CardStatusError';
        this.sw1 = sw1;
        this.sw2 = sw2;
    }
}

type CardOsErrorConstructor = new (message?: string) => CardOsError;

/**
 * Error codes mapped to specific error classes
 */
const ERROR_CODE_MAP = new Map<number, CardOsErrorConstructor>([
    [-1303, CapacityError], // BUFFER_TOO_SMALL
    [-1300, ArgumentError], // INVALID_ARGUMENTS
    [-1408, UnsupportedByCardError], // NO_CARD_SUPPORT
    [-1206, LengthError], // WRONG_LENGTH
    [-1404, OutOfMemoryError], // OUT_OF_MEMORY
    [-1213, UnexpectedResponseError], // UNKNOWN_DATA_RECEIVED
]);

/**
 * Factory function to create the appropriate error class based on an error code
 */
export function createCardOsError(message: string, code: number): CardOsError {
    const ErrorClass = ERROR_CODE_MAP.get(code);
    if (ErrorClass) {
        return new ErrorClass(message);
    }
    return new CardOsError(message, code);
}
