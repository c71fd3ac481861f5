import type { NamedNode, Literal } from 'n3';

/**
 * Subject-predicate-object statement. Subjects and predicates are always
 * IRIs in the graphs built here; objects are IRIs or literals.
 */
export interface Triple {
    subject: NamedNode;
    predicate: NamedNode;
    object: NamedNode | Literal;
}

/** Prefix -> namespace IRI, in binding order */
export type PrefixBindings = ReadonlyArray<readonly [prefix: string, namespace: string]>;

export interface KnowledgeGraph {
    prefixes: PrefixBindings;
    triples: Triple[];
}

export const OUTPUT_FORMATS = ['turtle'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];
