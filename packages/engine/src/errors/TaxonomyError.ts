/**
 * @fileoverview Taxonomy error classes
 *
 * Every failure the engine raises is local and deterministic: it comes from
 * caller input, never from a transient condition, so none of these are
 * retried. Each carries the class id / parameter name involved in `context`.
 *
 * @module @morphotax/engine/errors/TaxonomyError
 */

/**
 * Error codes for categorizing taxonomy errors.
 */
export enum TaxonomyErrorCode {
    INSUFFICIENT_SAMPLES = "INSUFFICIENT_SAMPLES",
    DUPLICATE_CLASS_ID   = "DUPLICATE_CLASS_ID",
    UNKNOWN_CLASS_ID     = "UNKNOWN_CLASS_ID",
    MALFORMED_IMPORT     = "MALFORMED_IMPORT",
    INVALID_PARAMETER    = "INVALID_PARAMETER",
    INVALID_CHANGE       = "INVALID_CHANGE",
}

/**
 * Base class for all engine errors.
 */
export class TaxonomyError extends Error {
    public readonly code: TaxonomyErrorCode;
    public readonly context: Readonly<Record<string, unknown>>;

    constructor(message: string, code: TaxonomyErrorCode, context: Record<string, unknown> = {}) {
        super(message);
        this.name = "TaxonomyError";
        this.code = code;
        this.context = Object.freeze({ ...context });

        Error.captureStackTrace(this, this.constructor);
    }

    /**
     * Convert error to JSON for logging
     */
    toJSON(): Record<string, unknown> {
        return {
            name   : this.name,
            code   : this.code,
            message: this.message,
            context: this.context,
        };
    }
}

/**
 * Fewer than two reference objects were supplied to the class builder.
 */
export class InsufficientSamplesError extends TaxonomyError {
    constructor(className: string, sampleCount: number, required = 2) {
        super(
            `Class "${className}" needs at least ${required} reference objects, got ${sampleCount}`,
            TaxonomyErrorCode.INSUFFICIENT_SAMPLES,
            { className, sampleCount, required }
        );
        this.name = "InsufficientSamplesError";
    }
}

export class DuplicateClassIdError extends TaxonomyError {
    constructor(classId: string) {
        super(
            `Class already registered: ${classId} (use modify to create a new version)`,
            TaxonomyErrorCode.DUPLICATE_CLASS_ID,
            { classId }
        );
        this.name = "DuplicateClassIdError";
    }
}

export class UnknownClassIdError extends TaxonomyError {
    constructor(classId: string) {
        super(`Class not found: ${classId}`, TaxonomyErrorCode.UNKNOWN_CLASS_ID, { classId });
        this.name = "UnknownClassIdError";
    }
}

/**
 * One problem found while validating an import document.
 */
export interface ImportIssue {
    /** Dotted path inside the document, e.g. "classes.TYPE_A.morphometricParams.length.tolerance" */
    readonly path: string;
    readonly message: string;
    readonly classId?: string;
    readonly parameter?: string;
}

/**
 * The whole import was rejected. Nothing from the document was loaded.
 */
export class MalformedImportError extends TaxonomyError {
    public readonly issues: readonly ImportIssue[];

    constructor(issues: readonly ImportIssue[]) {
        const first = issues[0];
        const summary = first ? `${first.path}: ${first.message}` : "unknown problem";
        const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : "";

        super(
            `Malformed taxonomy document: ${summary}${more}`,
            TaxonomyErrorCode.MALFORMED_IMPORT,
            {
                issueCount: issues.length,
                classId   : first?.classId,
                parameter : first?.parameter,
            }
        );
        this.name = "MalformedImportError";
        this.issues = Object.freeze([...issues]);
    }
}

/**
 * A parameter or class violates its structural invariants.
 */
export class InvalidParameterError extends TaxonomyError {
    constructor(parameter: string, reason: string, classId?: string) {
        super(
            classId
                ? `Invalid parameter "${parameter}" in class ${classId}: ${reason}`
                : `Invalid parameter "${parameter}": ${reason}`,
            TaxonomyErrorCode.INVALID_PARAMETER,
            { parameter, reason, classId }
        );
        this.name = "InvalidParameterError";
    }
}

/**
 * A modification request cannot be applied.
 */
export class InvalidChangeError extends TaxonomyError {
    constructor(classId: string, reason: string, parameter?: string) {
        super(
            `Cannot modify ${classId}: ${reason}`,
            TaxonomyErrorCode.INVALID_CHANGE,
            { classId, reason, parameter }
        );
        this.name = "InvalidChangeError";
    }
}

/**
 * Type guard for engine errors.
 */
export function isTaxonomyError(error: unknown): error is TaxonomyError {
    return error instanceof TaxonomyError;
}
