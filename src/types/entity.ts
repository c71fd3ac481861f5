/**
 * Named entity as returned by a recognizer.
 *
 * `type` is the recognizer's label. Labels outside KNOWN_ENTITY_TYPES are
 * carried through untouched and resolved when the graph is assembled.
 */
export interface Entity {
    readonly text: string;
    readonly type: string;
}

export const KNOWN_ENTITY_TYPES = [
    'PERSON',
    'ORG',
    'GPE',
    'LOC',
    'DATE',
    'EVENT',
    'WORK_OF_ART',
    'PRODUCT',
    'FAC',
    'NORP',
] as const;

export type KnownEntityType = typeof KNOWN_ENTITY_TYPES[number];

const KNOWN_LABELS: ReadonlySet<string> = new Set(KNOWN_ENTITY_TYPES);

export function isKnownEntityType(value: string): value is KnownEntityType {
    return KNOWN_LABELS.has(value);
}
