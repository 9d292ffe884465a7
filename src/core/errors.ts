export type AbrErrorCode = 'INVALID_INPUT' | 'INVALID_STATE';

export class AbrError extends Error {
    public readonly code: AbrErrorCode;

    constructor(code: AbrErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Caller passed a value the engine refuses to coerce. */
export class InvalidInputError extends AbrError {
    constructor(message: string) {
        super('INVALID_INPUT', message);
    }
}

export class SessionStateError extends AbrError {
    constructor(message: string) {
        super('INVALID_STATE', message);
    }
}

export function assertNonNegative(value: number, label: string): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new InvalidInputError(`${label} must be a finite, non-negative number (got ${value})`);
    }
}
