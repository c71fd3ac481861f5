import type { RelationTable } from '../types/relation.js';

/**
 * Relations recognized in every document.
 */
export const STANDARD_RELATIONS: RelationTable = {
    'date of birth': {
        description: 'The date on which the subject was born',
        domain: 'Person',
        range: 'Date',
    },
    'date of death': {
        description: 'The date on which the subject died',
        domain: 'Person',
        range: 'Date',
    },
    'occupation': {
        description: 'The occupation of a person',
        domain: 'Person',
        range: 'Occupation',
    },
    'country of citizenship': {
        description: 'The country of which the subject is a citizen',
        domain: 'Person',
        range: 'Country',
    },
    'notable work': {
        description: 'The most notable work of a person',
        domain: 'Person',
        range: 'Creative Work',
    },
};
