/**
 * @fileoverview Error barrel exports
 *
 * @module @morphotax/engine/errors
 */

export {
    TaxonomyError,
    TaxonomyErrorCode,
    InsufficientSamplesError,
    DuplicateClassIdError,
    UnknownClassIdError,
    MalformedImportError,
    InvalidParameterError,
    InvalidChangeError,
    isTaxonomyError,
    type ImportIssue,
} from "./TaxonomyError.js";
