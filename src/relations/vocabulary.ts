import type {
    RelationDefinition,
    RelationInput,
    RelationRecord,
    RelationTable,
} from '../types/relation.js';
import { UNKNOWN_TYPE } from '../types/relation.js';
import { createInvalidRelationError } from '../types/errors.js';
import { STANDARD_RELATIONS } from './standard.js';

function normalizeKey(name: string): string {
    return name.trim().toLowerCase();
}

/**
 * Lowercased name -> definition. Built as a Map so names such as
 * `__proto__` are ordinary keys.
 */
function normalizeTable(table: RelationTable): Map<string, RelationDefinition> {
    const normalized = new Map<string, RelationDefinition>();
    for (const [name, definition] of Object.entries(table)) {
        const key = normalizeKey(name);
        if (!key) continue;
        normalized.set(key, definition);
    }
    return normalized;
}

/**
 * Immutable relation vocabulary: a base table merged with an override table.
 *
 * Keys are stored lowercased. On collision the override entry wins, but the
 * key keeps its position from the base table so iteration order is stable.
 * `withRelation` returns a new vocabulary; instances are never mutated.
 */
export class RelationVocabulary {
    private readonly base: ReadonlyMap<string, RelationDefinition>;
    private readonly overrides: ReadonlyMap<string, RelationDefinition>;
    private readonly merged: ReadonlyMap<string, RelationDefinition>;

    constructor(overrides: RelationTable = {}, base: RelationTable = STANDARD_RELATIONS) {
        this.base = normalizeTable(base);
        this.overrides = normalizeTable(overrides);

        const merged = new Map(this.base);
        for (const [key, definition] of this.overrides) {
            merged.set(key, definition);
        }
        this.merged = merged;
    }

    get size(): number {
        return this.merged.size;
    }

    has(name: string): boolean {
        return this.merged.has(normalizeKey(name));
    }

    get(name: string): RelationDefinition | undefined {
        return this.merged.get(normalizeKey(name));
    }

    /** Relation names in iteration order */
    names(): string[] {
        return Array.from(this.merged.keys());
    }

    entries(): Array<[string, RelationDefinition]> {
        return Array.from(this.merged.entries());
    }

    /** The user-supplied table only, as persisted to disk */
    getOverrides(): RelationTable {
        // fromEntries defines own properties, so every name survives as a key
        return Object.fromEntries(this.overrides);
    }

    /**
     * Returns a vocabulary with `input` inserted into (or replacing an entry of)
     * the override table.
     */
    withRelation(input: RelationInput): RelationVocabulary {
        const key = normalizeKey(input.relation);
        if (!key) {
            throw createInvalidRelationError('Relation name must not be empty', {
                relation: input.relation,
            });
        }

        const definition: RelationDefinition = {
            description: input.description ?? '',
            domain: input.domain || UNKNOWN_TYPE,
            range: input.range || UNKNOWN_TYPE,
        };

        const overrides = new Map(this.overrides).set(key, definition);
        return new RelationVocabulary(Object.fromEntries(overrides), Object.fromEntries(this.base));
    }

    /** Relation record for a known name, with defaults filled in */
    toRecord(name: string): RelationRecord | undefined {
        const key = normalizeKey(name);
        const definition = this.merged.get(key);
        if (!definition) return undefined;
        return {
            relation: key,
            description: definition.description,
            domain: definition.domain || UNKNOWN_TYPE,
            range: definition.range || UNKNOWN_TYPE,
        };
    }
}
