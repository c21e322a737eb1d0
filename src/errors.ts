/**
 * Error classes for the variant annotator
 *
 * Every error carries a `kind` so the enrichment step can tell a row-level
 * failure (bad input, unreachable service, no record) from a fault that
 * must stop the batch (storage, configuration, programming errors).
 */

export type ErrorKind =
    | 'input-format'
    | 'connection'
    | 'not-found'
    | 'storage'
    | 'configuration';

export enum ErrorCode {
    // Input format (1xxx)
    MISSING_FIELD = 'E1000',
    INVALID_VARIANT_DESCRIPTION = 'E1001',
    INVALID_HGVS = 'E1002',
    INVALID_CLINVAR_ID = 'E1003',
    UNSUPPORTED_FILE = 'E1004',

    // External services (2xxx)
    SERVICE_CONNECTION_FAILED = 'E2000',
    TRANSCRIPT_NOT_FOUND = 'E2001',
    CLINVAR_ID_NOT_FOUND = 'E2002',

    // Store (3xxx)
    STORAGE_FAILED = 'E3000',
    FOREIGN_KEYS_DISABLED = 'E3001',
}

export class AnnotatorError extends Error {
    public readonly code: ErrorCode;
    public readonly kind: ErrorKind;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: ErrorCode, kind: ErrorKind, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AnnotatorError';
        this.code = code;
        this.kind = kind;
        this.context = context;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            kind: this.kind,
            context: this.context,
        };
    }

    toString(): string {
        return `[${this.code}] ${this.name}: ${this.message}`;
    }
}

/**
 * A row lacks one of chromosome, position, ref or alt.
 */
export class MissingFieldError extends AnnotatorError {
    constructor(field: string, context?: Record<string, unknown>) {
        super(`Variant row is missing required field '${field}'`, ErrorCode.MISSING_FIELD, 'input-format', context);
        this.name = 'MissingFieldError';
    }
}

export class VariantDescriptionError extends AnnotatorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, ErrorCode.INVALID_VARIANT_DESCRIPTION, 'input-format', context);
        this.name = 'VariantDescriptionError';
    }
}

export class HgvsFormatError extends AnnotatorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, ErrorCode.INVALID_HGVS, 'input-format', context);
        this.name = 'HgvsFormatError';
    }
}

export class ClinVarIdFormatError extends AnnotatorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, ErrorCode.INVALID_CLINVAR_ID, 'input-format', context);
        this.name = 'ClinVarIdFormatError';
    }
}

export class UnsupportedFileError extends AnnotatorError {
    constructor(filePath: string) {
        super(
            `Unsupported variant file '${filePath}': expected .csv, .vcf or .tsv`,
            ErrorCode.UNSUPPORTED_FILE,
            'input-format',
            { filePath }
        );
        this.name = 'UnsupportedFileError';
    }
}

/**
 * Timeout, network failure, non-2xx status or unparseable body.
 */
export class ServiceConnectionError extends AnnotatorError {
    public readonly service: string;

    constructor(service: string, message: string, context?: Record<string, unknown>) {
        super(message, ErrorCode.SERVICE_CONNECTION_FAILED, 'connection', { service, ...context });
        this.name = 'ServiceConnectionError';
        this.service = service;
    }
}

export class TranscriptNotFoundError extends AnnotatorError {
    constructor(vcfForm: string) {
        super(
            `No transcript-level HGVS description returned for '${vcfForm}'`,
            ErrorCode.TRANSCRIPT_NOT_FOUND,
            'not-found',
            { vcfForm }
        );
        this.name = 'TranscriptNotFoundError';
    }
}

export class ClinVarIdNotFoundError extends AnnotatorError {
    constructor(hgvs: string) {
        super(`Variant '${hgvs}' not found in ClinVar`, ErrorCode.CLINVAR_ID_NOT_FOUND, 'not-found', { hgvs });
        this.name = 'ClinVarIdNotFoundError';
    }
}

export class StorageError extends AnnotatorError {
    constructor(message: string, code: ErrorCode = ErrorCode.STORAGE_FAILED, context?: Record<string, unknown>) {
        super(message, code, 'storage', context);
        this.name = 'StorageError';
    }
}

const ROW_LEVEL_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['input-format', 'connection', 'not-found']);

/**
 * True for failures that degrade a single row's annotation instead of the batch.
 */
export function isAnnotationFailure(error: unknown): error is AnnotatorError {
    return error instanceof AnnotatorError && ROW_LEVEL_KINDS.has(error.kind);
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
