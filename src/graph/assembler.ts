import { DataFactory } from 'n3';
import type { Literal, NamedNode } from 'n3';
import type { Entity } from '../types/entity.js';
import { isKnownEntityType } from '../types/entity.js';
import type { KnowledgeGraph, Triple } from '../types/graph.js';
import type { RelationRecord } from '../types/relation.js';
import { createSerializationFailure, isGraphException } from '../types/errors.js';
import {
    DOCUMENT_IRI,
    DOCUMENT_LABEL,
    ENTITY_TYPE_CLASSES,
    PREFIXES,
    TERMS,
    WD,
    WDT,
    questionIri,
} from './namespaces.js';
import { sanitizeUriComponent } from './sanitize.js';
import type { GraphWriter } from './writers/interface.js';
import { TurtleWriter } from './writers/turtle.js';

const { namedNode, literal } = DataFactory;

/** Characters Turtle does not allow inside <...> */
const FORBIDDEN_IRI_CHARS = /[\u0000- <>"{}|^`\\]/;

export interface GraphAssemblerOptions {
    /** Serializer used by build(); Turtle by default */
    writer?: GraphWriter;
    /** Also state each relation's rdfs:domain and rdfs:range */
    includeSignatures?: boolean;
}

/**
 * Ordered triple collection that drops repeats of a triple already added.
 */
class TripleSet {
    private readonly keys = new Set<string>();
    readonly triples: Triple[] = [];

    add(subject: NamedNode, predicate: NamedNode, object: NamedNode | Literal): void {
        const key = JSON.stringify([
            subject.value,
            predicate.value,
            object.termType,
            object.value,
            object.termType === 'Literal' ? object.language : '',
            object.termType === 'Literal' ? object.datatype.value : '',
        ]);
        if (this.keys.has(key)) return;
        this.keys.add(key);
        this.triples.push({ subject, predicate, object });
    }
}

function iri(value: string): NamedNode {
    if (FORBIDDEN_IRI_CHARS.test(value)) {
        throw new Error(`Invalid IRI: ${value}`);
    }
    return namedNode(value);
}

/**
 * Builds the RDF graph for one document.
 *
 * Entities are keyed by their sanitized text, relations by their sanitized
 * name, questions by 1-based position. Every input element produces its
 * triples; only exact repeats are dropped.
 */
export class GraphAssembler {
    private readonly writer: GraphWriter;
    private readonly includeSignatures: boolean;

    constructor(options: GraphAssemblerOptions = {}) {
        this.writer = options.writer ?? new TurtleWriter();
        this.includeSignatures = options.includeSignatures ?? false;
    }

    getWriter(): GraphWriter {
        return this.writer;
    }

    /**
     * Assembles the triples. Throws SERIALIZATION_FAILURE; nothing partial
     * is returned. The document node carries only its type and label, so
     * `text` does not appear in the graph.
     */
    assemble(
        text: string,
        entities: readonly Entity[],
        relations: readonly RelationRecord[],
        questions: readonly string[]
    ): KnowledgeGraph {
        try {
            return this.assembleTriples(entities, relations, questions);
        } catch (e) {
            throw isGraphException(e) ? e : createSerializationFailure(e);
        }
    }

    /**
     * Assembles and serializes the graph with the configured writer.
     */
    async build(
        text: string,
        entities: readonly Entity[],
        relations: readonly RelationRecord[],
        questions: readonly string[]
    ): Promise<string> {
        const graph = this.assemble(text, entities, relations, questions);
        try {
            return await this.writer.serialize(graph);
        } catch (e) {
            throw createSerializationFailure(e);
        }
    }

    private assembleTriples(
        entities: readonly Entity[],
        relations: readonly RelationRecord[],
        questions: readonly string[]
    ): KnowledgeGraph {
        const graph = new TripleSet();
        const rdfType = iri(TERMS.type);
        const label = iri(TERMS.label);
        const documentNode = iri(DOCUMENT_IRI);

        graph.add(documentNode, rdfType, iri(TERMS.creativeWork));
        graph.add(documentNode, label, literal(DOCUMENT_LABEL, 'en'));

        const unmapped = new Set<string>();
        for (const entity of entities) {
            const node = iri(`${WD}${sanitizeUriComponent(entity.text)}`);
            graph.add(node, rdfType, iri(this.entityClass(entity.type, unmapped)));
            graph.add(node, label, literal(entity.text, 'en'));
            graph.add(documentNode, iri(TERMS.mentions), node);
        }

        for (const relation of relations) {
            const node = iri(`${WDT}${sanitizeUriComponent(relation.relation)}`);
            graph.add(node, rdfType, iri(TERMS.property));
            graph.add(node, label, literal(relation.relation));
            graph.add(node, iri(TERMS.comment), literal(relation.description));
            if (this.includeSignatures) {
                graph.add(node, iri(TERMS.domain), iri(`${WD}${sanitizeUriComponent(relation.domain)}`));
                graph.add(node, iri(TERMS.range), iri(`${WD}${sanitizeUriComponent(relation.range)}`));
            }
        }

        questions.forEach((question, index) => {
            const node = iri(questionIri(index + 1));
            graph.add(node, rdfType, iri(TERMS.question));
            graph.add(node, label, literal(question, 'en'));
            graph.add(documentNode, iri(TERMS.hasPart), node);
        });

        return { prefixes: PREFIXES, triples: graph.triples };
    }

    private entityClass(type: string, unmapped: Set<string>): string {
        if (isKnownEntityType(type)) {
            return ENTITY_TYPE_CLASSES[type];
        }
        if (!unmapped.has(type)) {
            unmapped.add(type);
            console.warn(`Unmapped entity type '${type}', typing as schema:Thing`);
        }
        return TERMS.thing;
    }
}
