import nlp from 'compromise';
import type { Entity } from '../types/entity.js';
import type { EntityRecognizer } from './recognizer.js';

const TRAILING_PUNCTUATION = /[\s.,;:!?]+$/;

function surfaces(values: unknown): string[] {
    if (!Array.isArray(values)) return [];
    return values
        .filter((value): value is string => typeof value === 'string')
        .map(value => value.trim().replace(TRAILING_PUNCTUATION, ''))
        .filter(value => value.length > 0);
}

/**
 * Rule-based recognizer on top of compromise. People, organizations, places
 * and date phrases become PERSON, ORG, GPE and DATE, ordered by where they
 * first occur in the text.
 */
export class CompromiseRecognizer implements EntityRecognizer {
    readonly name = 'compromise';

    recognize(text: string): Entity[] {
        const doc = nlp(text);
        const found: Array<Entity & { position: number; seq: number }> = [];

        const collect = (values: unknown, type: string) => {
            for (const surface of surfaces(values)) {
                const position = text.indexOf(surface);
                found.push({
                    text: surface,
                    type,
                    position: position === -1 ? Number.MAX_SAFE_INTEGER : position,
                    seq: found.length,
                });
            }
        };

        collect(doc.people().out('array'), 'PERSON');
        collect(doc.organizations().out('array'), 'ORG');
        collect(doc.places().out('array'), 'GPE');
        collect(doc.match('#Date+').out('array'), 'DATE');

        return found
            .sort((x, y) => x.position - y.position || x.seq - y.seq)
            .map(({ text: surface, type }) => ({ text: surface, type }));
    }
}
