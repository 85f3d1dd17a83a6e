export type RelayErrorKind = 'protocol' | 'transport' | 'upstream_rejected';

/**
 * Failure of a single relayed connection. Never crosses the session boundary:
 * the session logs it and closes both sockets.
 */
export class RelayError extends Error {
    readonly kind: RelayErrorKind;
    // Reply code reported by the upstream proxy, when there is one
    readonly status?: number;

    constructor(kind: RelayErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'RelayError';
        this.kind = kind;
        this.status = options.status;
    }
}

export type ConfigErrorCode =
    | 'PASSPHRASE_REQUIRED'
    | 'DECRYPT_FAILED'
    | 'MISSING_FIELD'
    | 'INVALID_FIELD'
    | 'MALFORMED_RECORD';

export class ConfigError extends Error {
    readonly code: ConfigErrorCode;

    constructor(code: ConfigErrorCode, message: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ConfigError';
        this.code = code;
    }
}

export class CipherError extends Error {
    constructor(message: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'CipherError';
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
