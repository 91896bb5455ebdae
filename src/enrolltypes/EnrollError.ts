/** Process exit codes used by the command line front end */
export enum ExitCode {
    Success = 0,
    ConnectivityFailed = 1,
    BadArguments = 2,
    CredentialOrCrypto = 3,
    FileIO = 4,
    Transport = 5,
    Unexpected = 70,
}

/** Extends the standard Error type and adds the exit code the process should terminate with */
export class EnrollError extends Error {
    /** Process exit code */
    public readonly exitCode: ExitCode;
    /**
     * @constructor
     * @param exitCode Exit code to report if this error reaches the top level
     * @param message Error message
     */
    constructor(exitCode: ExitCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.exitCode = exitCode;
    }

    /**
     * Wraps anything thrown into an EnrollError so the caller can report it uniformly.
     *
     * @param err Whatever was caught
     * @returns The original error if it already is an EnrollError otherwise a wrapped one
     */
    static getEnrollError(err: unknown): EnrollError {
        return err instanceof EnrollError
            ? err
            : new EnrollError(ExitCode.Unexpected, err instanceof Error ? err.message : String(err));
    }
}

export class ArgumentError extends EnrollError {
    constructor(message: string) {
        super(ExitCode.BadArguments, message);
    }
}

export class ConfigError extends EnrollError {
    constructor(message: string) {
        super(ExitCode.BadArguments, message);
    }
}

/** Missing or unusable user certificate or key */
export class CredentialError extends EnrollError {
    constructor(message: string) {
        super(ExitCode.CredentialOrCrypto, message);
    }
}

/** Key pair generation or CSR construction failed */
export class CryptoError extends EnrollError {
    constructor(message: string) {
        super(ExitCode.CredentialOrCrypto, message);
    }
}

/** Output directory or file could not be written */
export class OutputError extends EnrollError {
    public readonly path: string;
    constructor(path: string, message: string) {
        super(ExitCode.FileIO, message);
        this.path = path;
    }
}

export type TransportErrorKind = 'authentication' | 'connection';

/**
 * Raised by the issuer client when a request never produced an HTTP response.
 * Authentication covers TLS handshake and client certificate failures, connection
 * covers everything from DNS lookup to a dropped socket or timeout.
 */
export class TransportError extends EnrollError {
    public readonly kind: TransportErrorKind;
    public readonly code?: string;
    constructor(kind: TransportErrorKind, message: string, code?: string) {
        super(ExitCode.Transport, message);
        this.kind = kind;
        this.code = code;
    }
}
