export type PersonRegistryErrorKind = 'NotFound' | 'DuplicateEmail' | 'BackingStoreUnavailable';

export abstract class PersonRegistryError extends Error {
    abstract readonly kind: PersonRegistryErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class PersonNotFoundError extends PersonRegistryError {
    readonly kind = 'NotFound';

    constructor(readonly personId: number) {
        super(`Person ${personId} not found`);
    }
}

export class DuplicateEmailError extends PersonRegistryError {
    readonly kind = 'DuplicateEmail';

    constructor(readonly email: string) {
        super(`Email ${email} is already registered`);
    }
}

/**
 * Raised when the backing store fails mid-operation (closed handle, I/O error, ...).
 * The underlying error is kept as `cause`.
 */
export class BackingStoreUnavailableError extends PersonRegistryError {
    readonly kind = 'BackingStoreUnavailable';

    constructor(cause: unknown) {
        super(`Backing store unavailable: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    }
}

export const isPersonRegistryError = (error: unknown): error is PersonRegistryError =>
    error instanceof PersonRegistryError;
