/**
 * Error taxonomy
 *
 * FetchError and MalformedPostError are recovered inside a scrape run;
 * PersistenceError aborts it.
 */

export class FetchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FetchError';
    }
}

export class PersistenceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PersistenceError';
    }
}

export class MalformedPostError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedPostError';
    }
}

export class StateTransitionError extends Error {
    constructor(
        readonly handle: string,
        readonly from: string,
        readonly to: string,
    ) {
        super(`Cannot move @${handle} from ${from} to ${to}`);
        this.name = 'StateTransitionError';
    }
}

export class ProfileNotFoundError extends Error {
    constructor(readonly handle: string) {
        super(`Profile @${handle} is not tracked`);
        this.name = 'ProfileNotFoundError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.name;
    }
    return String(error);
}
