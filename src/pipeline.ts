import type { Entity } from './types/entity.js';
import type { RelationRecord } from './types/relation.js';
import { PipelineOptionsSchema, PipelineOptionsInput } from './types/options.js';
import { createExtractionFailure, createInvalidOptionsError } from './types/errors.js';
import { EntityObserver } from './entities/observer.js';
import { QuestionGenerator } from './questions/generator.js';
import { RelationExtractor } from './relations/extractor.js';
import { OntologyMatcher } from './ontology/matcher.js';
import { GraphAssembler } from './graph/assembler.js';
import { createGraphWriter } from './graph/writers/registry.js';
import type { GraphWriter } from './graph/writers/interface.js';
import { DocumentReader, PlainTextReader } from './sources/reader.js';

export interface PipelineComponents {
    observer?: EntityObserver;
    questions?: QuestionGenerator;
    extractor?: RelationExtractor;
    matcher?: OntologyMatcher;
    reader?: DocumentReader;
}

export interface PipelineResult {
    /** Serialized graph */
    graph: string;
    writer: GraphWriter;
    entities: Entity[];
    questions: string[];
    /** Relations after ontology normalization */
    relations: RelationRecord[];
}

/**
 * Text -> knowledge graph. Every run is independent; the only state read
 * across runs is the extractor's relation vocabulary.
 */
export class KnowledgeGraphPipeline {
    private readonly observer: EntityObserver;
    private readonly questions: QuestionGenerator;
    private readonly extractor: RelationExtractor;
    private readonly matcher: OntologyMatcher;
    private readonly reader: DocumentReader;

    constructor(components: PipelineComponents = {}) {
        this.observer = components.observer ?? new EntityObserver();
        this.questions = components.questions ?? new QuestionGenerator();
        this.extractor = components.extractor ?? new RelationExtractor();
        this.matcher = components.matcher ?? new OntologyMatcher();
        this.reader = components.reader ?? new PlainTextReader();
    }

    getExtractor(): RelationExtractor {
        return this.extractor;
    }

    getMatcher(): OntologyMatcher {
        return this.matcher;
    }

    async run(text: string, input: PipelineOptionsInput = {}): Promise<PipelineResult> {
        // Unsupported formats fail before any stage runs
        const writer = createGraphWriter(input.outputFormat ?? 'turtle');

        const parsed = PipelineOptionsSchema.safeParse(input);
        if (!parsed.success) {
            throw createInvalidOptionsError(parsed.error.issues);
        }
        const options = parsed.data;

        const entities = await this.observer.observe(text);
        const questions = this.questions.generate(entities, options.maxQuestions);
        const relations = this.matcher.match(this.extractor.extract(text));

        const assembler = new GraphAssembler({ writer, includeSignatures: options.includeSignatures });
        const graph = await assembler.build(text, entities, relations, questions);

        return { graph, writer, entities, questions, relations };
    }

    /**
     * Reads `filePath` through the document reader, then runs the pipeline.
     */
    async runFile(filePath: string, input: PipelineOptionsInput = {}): Promise<PipelineResult> {
        createGraphWriter(input.outputFormat ?? 'turtle');

        let text: string;
        try {
            text = await this.reader.read(filePath);
        } catch (e) {
            throw createExtractionFailure(`Could not extract text from ${filePath}`, e, filePath);
        }
        return this.run(text, input);
    }
}
