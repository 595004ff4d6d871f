/**
 * Error types for mangadex-dl
 */

/**
 * Base class for every failure raised by the library
 */
export class MangadexError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MangadexError';
    }
}

/**
 * A malformed link, or a link to a foreign host or the wrong entity kind
 */
export class InvalidReferenceError extends MangadexError {
    constructor(public readonly input: string) {
        super(`invalid url '${input}'`);
        this.name = 'InvalidReferenceError';
    }
}

/**
 * Non-2xx response or transport failure
 */
export class RequestError extends MangadexError {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'RequestError';
    }
}

/**
 * Response body that is not valid JSON or does not have the expected shape
 */
export class DecodeError extends MangadexError {
    constructor(
        message: string,
        public readonly url: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'DecodeError';
    }
}

/**
 * Filesystem failure
 */
export class IoError extends MangadexError {
    constructor(
        message: string,
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'IoError';
    }
}

/**
 * Renders any thrown value as a single line
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
