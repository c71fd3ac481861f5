/**
 * Shared test fixtures.
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Parser, Quad } from 'n3';
import type { Entity } from '../src/types/entity.js';
import type { RelationRecord } from '../src/types/relation.js';
import type { EntityRecognizer } from '../src/entities/recognizer.js';
import { GraphException } from '../src/types/errors.js';

export const SAMPLE_TEXT =
    "Douglas Adams was a famous British author known for The Hitchhiker's Guide to the Galaxy.";

export const DOUGLAS: Entity = { text: 'Douglas Adams', type: 'PERSON' };

export const OCCUPATION: RelationRecord = {
    relation: 'occupation',
    description: 'The primary occupation of a person',
    domain: 'Person',
    range: 'Occupation',
};

export const PERCENT: RelationRecord = {
    relation: '20%',
    description: 'Percentage test',
    domain: 'Measurement',
    range: 'Percentage',
};

export const NS = {
    wd: 'http://www.wikidata.org/entity/',
    wdt: 'http://www.wikidata.org/prop/direct/',
    schema: 'http://schema.org/',
    rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
    rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
};

export const RDF_TYPE = `${NS.rdf}type`;
export const RDFS_LABEL = `${NS.rdfs}label`;

/** Recognizer returning a fixed entity list */
export function createStubRecognizer(entities: Entity[]): EntityRecognizer & { calls: string[] } {
    const calls: string[] = [];
    return {
        name: 'stub',
        calls,
        recognize(text: string) {
            calls.push(text);
            return entities;
        },
    };
}

export function parseTurtle(turtle: string): Quad[] {
    return new Parser({ format: 'Turtle' }).parse(turtle);
}

interface TermValues {
    subject: { value: string };
    predicate: { value: string };
    object: { value: string };
}

export function hasTriple(quads: readonly TermValues[], subject: string, predicate: string, object: string): boolean {
    return quads.some(q =>
        q.subject.value === subject && q.predicate.value === predicate && q.object.value === object
    );
}

export async function createTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'ontograph-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/** Runs fn and returns the GraphException it throws */
export function catchGraphError(fn: () => unknown): GraphException {
    try {
        fn();
    } catch (e) {
        if (e instanceof GraphException) return e;
        throw e;
    }
    throw new Error('Expected a GraphException to be thrown');
}

export async function rejectGraphError(promise: Promise<unknown>): Promise<GraphException> {
    try {
        await promise;
    } catch (e) {
        if (e instanceof GraphException) return e;
        throw e;
    }
    throw new Error('Expected a GraphException rejection');
}
