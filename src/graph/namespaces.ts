import type { KnownEntityType } from '../types/entity.js';
import type { PrefixBindings } from '../types/graph.js';

export const WD = 'http://www.wikidata.org/entity/';
export const WDT = 'http://www.wikidata.org/prop/direct/';
export const SCHEMA = 'http://schema.org/';
export const RDFS = 'http://www.w3.org/2000/01/rdf-schema#';
export const RDF = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const XSD = 'http://www.w3.org/2001/XMLSchema#';

/** Prefix bindings written at the top of every serialized graph */
export const PREFIXES: PrefixBindings = [
    ['wd', WD],
    ['wdt', WDT],
    ['schema', SCHEMA],
    ['rdfs', RDFS],
    ['rdf', RDF],
    ['xsd', XSD],
];

export const TERMS = {
    type: `${RDF}type`,
    label: `${RDFS}label`,
    comment: `${RDFS}comment`,
    domain: `${RDFS}domain`,
    range: `${RDFS}range`,
    creativeWork: `${SCHEMA}CreativeWork`,
    property: `${SCHEMA}Property`,
    question: `${SCHEMA}Question`,
    thing: `${SCHEMA}Thing`,
    mentions: `${SCHEMA}mentions`,
    hasPart: `${SCHEMA}hasPart`,
} as const;

/** schema.org class for each recognized entity label */
export const ENTITY_TYPE_CLASSES: Readonly<Record<KnownEntityType, string>> = {
    PERSON: `${SCHEMA}Person`,
    ORG: `${SCHEMA}Organization`,
    GPE: `${SCHEMA}Place`,
    LOC: `${SCHEMA}Place`,
    FAC: `${SCHEMA}Place`,
    DATE: `${SCHEMA}Date`,
    EVENT: `${SCHEMA}Event`,
    WORK_OF_ART: `${SCHEMA}CreativeWork`,
    PRODUCT: `${SCHEMA}Product`,
    NORP: `${SCHEMA}Audience`,
};

export const DOCUMENT_IRI = `${WD}Document`;
export const DOCUMENT_LABEL = 'Source Document';

export function questionIri(ordinal: number): string {
    return `${WD}CompetencyQuestion_${ordinal}`;
}
