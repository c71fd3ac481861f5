import type { RelationInput, RelationRecord } from '../types/relation.js';
import { RelationVocabulary } from './vocabulary.js';
import { saveCustomRelations } from './storage.js';

/**
 * Finds known relation phrases in text.
 *
 * Matching is a case-insensitive substring test of every vocabulary name
 * against the whole text, so overlapping phrases ("date of birth" and
 * "birth") both match. Each matched name yields exactly one record.
 */
export class RelationExtractor {
    private vocabulary: RelationVocabulary;

    constructor(vocabulary: RelationVocabulary = new RelationVocabulary()) {
        this.vocabulary = vocabulary;
    }

    extract(text: string): RelationRecord[] {
        // One snapshot for the whole scan; addRelation swaps the reference.
        const vocabulary = this.vocabulary;
        const haystack = text.toLowerCase();
        const relations: RelationRecord[] = [];

        for (const name of vocabulary.names()) {
            if (!haystack.includes(name)) continue;
            const record = vocabulary.toRecord(name);
            if (record) relations.push(record);
        }

        return relations;
    }

    /**
     * Adds or replaces a user-supplied relation. Visible to every later
     * `extract` call on this extractor.
     */
    addRelation(input: RelationInput): RelationRecord | undefined {
        this.vocabulary = this.vocabulary.withRelation(input);
        return this.vocabulary.toRecord(input.relation);
    }

    getVocabulary(): RelationVocabulary {
        return this.vocabulary;
    }

    /**
     * Persists the user-supplied relations. Rejects with CONFIG_SAVE_ERROR;
     * the in-memory vocabulary is unaffected either way.
     */
    async saveRelations(path: string): Promise<void> {
        await saveCustomRelations(path, this.vocabulary.getOverrides());
    }
}
