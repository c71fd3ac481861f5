
import {
    EntityObserver,
    KnowledgeGraphPipeline,
    OntologyMatcher,
    sanitizeUriComponent,
    similarityRatio,
} from '../src/lib.js';
import { createStubRecognizer, DOUGLAS } from './fixtures.js';

describe('Library Export', () => {
    test('should build a graph through the exported pipeline', async () => {
        const pipeline = new KnowledgeGraphPipeline({
            observer: new EntityObserver(createStubRecognizer([DOUGLAS])),
        });

        const result = await pipeline.run('Douglas Adams listed his occupation as writer.');
        expect(result.questions).toEqual(['What is the person of Douglas Adams?']);
        expect(result.graph).toContain('wd:Douglas_Adams');
    });

    test('should expose the matching helpers', () => {
        expect(new OntologyMatcher().similar('profession', 'career')).toBe(true);
        expect(similarityRatio('abcd', 'bcde')).toBeCloseTo(0.75, 10);
        expect(sanitizeUriComponent('20%')).toBe('20_');
    });
});
