/**
 * Shared type definitions for ontograph
 */

export {
    GraphException,
    isGraphException,
    describeCause,
    createConfigLoadError,
    createConfigSaveError,
    createUnsupportedFormatError,
    createExtractionFailure,
    createSerializationFailure,
    createInvalidRelationError,
    createInvalidArgumentError,
    createInvalidOptionsError,
    serializeGraphError,
} from './errors.js';

export type { GraphErrorCode, GraphError } from './errors.js';

export type {
    RelationRecord,
    RelationDefinition,
    RelationTable,
    RelationInput,
} from './relation.js';
export { UNKNOWN_TYPE } from './relation.js';

export type { Entity, KnownEntityType } from './entity.js';
export { KNOWN_ENTITY_TYPES, isKnownEntityType } from './entity.js';

export type { Triple, PrefixBindings, KnowledgeGraph, OutputFormat } from './graph.js';
export { OUTPUT_FORMATS } from './graph.js';

export { DEFAULTS, PipelineOptionsSchema, SimilarityThresholdSchema } from './options.js';
export type { PipelineOptions, PipelineOptionsInput } from './options.js';
