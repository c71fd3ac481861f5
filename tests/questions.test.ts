import { QuestionGenerator } from '../src/questions/generator.js';
import type { Entity } from '../src/types/entity.js';
import { catchGraphError } from './fixtures.js';

const ENTITIES: Entity[] = [
    { text: 'Douglas Adams', type: 'PERSON' },
    { text: 'British', type: 'NORP' },
    { text: "The Hitchhiker's Guide", type: 'WORK_OF_ART' },
    { text: 'Acme', type: 'ORG' },
    { text: 'London', type: 'GPE' },
    { text: '1952', type: 'DATE' },
];

describe('QuestionGenerator', () => {
    const generator = new QuestionGenerator();

    test('asks about eligible entities in order, three by default', () => {
        expect(generator.generate(ENTITIES)).toEqual([
            'What is the person of Douglas Adams?',
            'What is the org of Acme?',
            'What is the gpe of London?',
        ]);
    });

    test('honours the limit', () => {
        expect(generator.generate(ENTITIES, 4)).toHaveLength(4);
        expect(generator.generate(ENTITIES, 10)).toHaveLength(4);
        expect(generator.generate(ENTITIES, 0)).toEqual([]);
    });

    test('skips other entity types', () => {
        expect(generator.generate([{ text: 'British', type: 'NORP' }])).toEqual([]);
    });

    test('repeated entities repeat their question', () => {
        expect(generator.generate([ENTITIES[0], ENTITIES[0]])).toEqual([
            'What is the person of Douglas Adams?',
            'What is the person of Douglas Adams?',
        ]);
    });

    test('rejects a negative or fractional limit', () => {
        expect(catchGraphError(() => generator.generate(ENTITIES, -1)).code).toBe('INVALID_ARGUMENT');
        expect(catchGraphError(() => generator.generate(ENTITIES, 1.5)).code).toBe('INVALID_ARGUMENT');
    });
});
