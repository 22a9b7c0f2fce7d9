/**
 * Delivery Ledger Error Taxonomy
 * Centralized error codes for every rejected ledger operation.
 */

export enum ErrorCode {
    // I. Authority
    UNAUTHORIZED = 'UNAUTHORIZED',

    // II. Existence & Lifecycle
    NOT_FOUND = 'NOT_FOUND',
    ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
    ALREADY_COMPLETED = 'ALREADY_COMPLETED',
    PAUSED = 'PAUSED',

    // III. Input
    INVALID_STATUS = 'INVALID_STATUS',
    INVALID_COORDINATES = 'INVALID_COORDINATES',
    MALFORMED_FIELD = 'MALFORMED_FIELD',
    MALFORMED_FINGERPRINT = 'MALFORMED_FINGERPRINT',

    // IV. Capacity
    LOG_LIMIT_EXCEEDED = 'LOG_LIMIT_EXCEEDED',
    ORACLE_CAPACITY_EXCEEDED = 'ORACLE_CAPACITY_EXCEEDED',
    ROLE_CAPACITY_EXCEEDED = 'ROLE_CAPACITY_EXCEEDED',
}

const ERROR_CODES: readonly string[] = Object.values(ErrorCode);

export function isErrorCode(value: string): value is ErrorCode {
    return ERROR_CODES.includes(value);
}

export type InputErrorCode =
    | ErrorCode.INVALID_STATUS
    | ErrorCode.INVALID_COORDINATES
    | ErrorCode.MALFORMED_FIELD
    | ErrorCode.MALFORMED_FINGERPRINT;

const INPUT_ERRORS: ReadonlySet<ErrorCode> = new Set<InputErrorCode>([
    ErrorCode.INVALID_STATUS,
    ErrorCode.INVALID_COORDINATES,
    ErrorCode.MALFORMED_FIELD,
    ErrorCode.MALFORMED_FINGERPRINT,
]);

/**
 * True for the codes that reject the shape of a request rather than the state
 * of the ledger.
 */
export function isInputError(code: ErrorCode): code is InputErrorCode {
    return INPUT_ERRORS.has(code);
}

export type ErrorMetadata = Record<string, string | number | boolean | null>;

export class LedgerError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly detail: string,
        public readonly metadata: ErrorMetadata = {}
    ) {
        super(`[Ledger:${code}] ${detail}`);
        this.name = 'LedgerError';
    }
}
