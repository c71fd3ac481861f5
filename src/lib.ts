/**
 * ontograph - Library Entry Point
 *
 * Exports the pipeline and its components for use in other projects.
 * Nothing here touches process.argv or writes to stdout.
 */

// Pipeline
export { KnowledgeGraphPipeline } from './pipeline.js';
export type { PipelineComponents, PipelineResult } from './pipeline.js';

// Entities and questions
export { EntityObserver, CompromiseRecognizer } from './entities/index.js';
export type { EntityRecognizer } from './entities/index.js';
export { QuestionGenerator, QUESTION_ENTITY_TYPES } from './questions/generator.js';

// Relations
export { RelationExtractor } from './relations/extractor.js';
export { RelationVocabulary } from './relations/vocabulary.js';
export { STANDARD_RELATIONS } from './relations/standard.js';
export {
    readCustomRelations,
    loadCustomRelations,
    saveCustomRelations,
    loadRelationVocabulary,
    RelationDefinitionSchema,
} from './relations/storage.js';

// Ontology matching
export { OntologyMatcher } from './ontology/matcher.js';
export type { OntologyMatcherOptions } from './ontology/matcher.js';
export { DEFAULT_EQUIVALENCE_GROUPS, loadEquivalenceGroups } from './ontology/equivalence.js';
export type { EquivalenceGroup } from './ontology/equivalence.js';
export { SequenceMatcher, similarityRatio } from './ontology/similarity.js';
export type { MatchingBlock } from './ontology/similarity.js';

// Graph
export { GraphAssembler } from './graph/assembler.js';
export type { GraphAssemblerOptions } from './graph/assembler.js';
export { sanitizeUriComponent } from './graph/sanitize.js';
export * from './graph/namespaces.js';
export * from './graph/writers/index.js';

// Sources
export { PlainTextReader } from './sources/reader.js';
export type { DocumentReader } from './sources/reader.js';

// Types and errors
export * from './types/index.js';
