/**
 * A relation observed in text, or its normalized form.
 *
 * `relation` is the human-readable surface or canonical name; `domain` and
 * `range` name types from the relation vocabulary.
 */
export interface RelationRecord {
    readonly relation: string;
    readonly description: string;
    readonly domain: string;
    readonly range: string;
}

/**
 * Value side of a relation vocabulary table.
 */
export interface RelationDefinition {
    readonly description: string;
    readonly domain: string;
    readonly range: string;
}

/** Relation name (lowercased) -> definition */
export type RelationTable = Readonly<Record<string, RelationDefinition>>;

/** Input accepted by addRelation; everything but the name is optional. */
export interface RelationInput {
    relation: string;
    description?: string;
    domain?: string;
    range?: string;
}

export const UNKNOWN_TYPE = 'Unknown';
