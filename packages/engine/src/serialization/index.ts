/**
 * @fileoverview Serialization barrel exports
 *
 * @module @morphotax/engine/serialization
 */

export {
    TAXONOMY_FORMAT_VERSION,
    TaxonomyDocumentSchema,
    ClassDocumentSchema,
    ParameterDocumentSchema,
    ChangeSetSchema,
    classToDocument,
    encodeTaxonomy,
    decodeTaxonomy,
    serializeTaxonomy,
    parseTaxonomyJson,
    parseChangeSet,
    type TaxonomyDocument,
    type ClassDocument,
    type ParameterDocument,
    type ClassLinks,
    type DecodedClass,
    type DecodedTaxonomy,
} from "./TaxonomyDocument.js";
