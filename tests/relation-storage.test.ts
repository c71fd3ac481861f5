import fs from 'fs/promises';
import path from 'path';
import {
    loadCustomRelations,
    loadRelationVocabulary,
    readCustomRelations,
    saveCustomRelations,
} from '../src/relations/storage.js';
import { RelationExtractor } from '../src/relations/extractor.js';
import { RelationVocabulary } from '../src/relations/vocabulary.js';
import { DEFAULT_EQUIVALENCE_GROUPS, loadEquivalenceGroups } from '../src/ontology/equivalence.js';
import { createTempDir, rejectGraphError, removeTempDir } from './fixtures.js';

describe('custom relation storage', () => {
    let dir: string;
    let warn: jest.SpyInstance;

    beforeEach(async () => {
        dir = await createTempDir();
        warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        warn.mockRestore();
        await removeTempDir(dir);
    });

    test('saved relations load back unchanged', async () => {
        const file = path.join(dir, 'nested', 'relations.json');
        const table = {
            'research area': { description: 'Field of study', domain: 'Researcher', range: 'Discipline' },
        };

        await saveCustomRelations(file, table);
        expect(await loadCustomRelations(file)).toEqual(table);
        expect(await fs.readFile(file, 'utf-8')).toBe(JSON.stringify(table, null, 2) + '\n');
    });

    test('missing fields get defaults', async () => {
        const file = path.join(dir, 'relations.json');
        await fs.writeFile(file, JSON.stringify({ 'research area': { description: 'x' } }));

        expect(await loadCustomRelations(file)).toEqual({
            'research area': { description: 'x', domain: 'Unknown', range: 'Unknown' },
        });
    });

    test('a missing file warns and yields no relations', async () => {
        const file = path.join(dir, 'absent.json');
        expect(await loadCustomRelations(file)).toEqual({});
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toContain(`Could not load configuration from ${file}`);
    });

    test('malformed JSON warns and yields no relations', async () => {
        const file = path.join(dir, 'broken.json');
        await fs.writeFile(file, '{ "occupation": ');

        expect(await loadCustomRelations(file)).toEqual({});
        expect(warn).toHaveBeenCalledTimes(1);
    });

    test('wrongly shaped entries are rejected as a whole', async () => {
        const file = path.join(dir, 'shape.json');
        await fs.writeFile(file, JSON.stringify({ occupation: { description: 42 } }));

        expect(await loadCustomRelations(file)).toEqual({});
    });

    test('the strict reader rejects an invalid file instead of emptying it', async () => {
        const file = path.join(dir, 'relations.json');
        await fs.writeFile(file, JSON.stringify({
            'field a': { description: 'A' },
            'field b': { description: 'B', domain: 3 },
        }));

        const error = await rejectGraphError(readCustomRelations(file));
        expect(error.code).toBe('CONFIG_LOAD_ERROR');
        expect(error.message).toContain(`Could not load configuration from ${file}: invalid relation 'field b'`);
        expect(warn).not.toHaveBeenCalled();
    });

    test('the strict reader wants a JSON object', async () => {
        const file = path.join(dir, 'relations.json');
        await fs.writeFile(file, '[]');
        expect((await rejectGraphError(readCustomRelations(file))).code).toBe('CONFIG_LOAD_ERROR');
    });

    test('a __proto__ relation survives a save and load', async () => {
        const file = path.join(dir, 'relations.json');
        const extractor = new RelationExtractor();
        extractor.addRelation({ relation: '__proto__', description: 'Prototype link' });
        await extractor.saveRelations(file);

        const table = await readCustomRelations(file);
        expect(Object.keys(table)).toEqual(['__proto__']);
        expect(new RelationVocabulary(table).toRecord('__proto__')).toEqual({
            relation: '__proto__',
            description: 'Prototype link',
            domain: 'Unknown',
            range: 'Unknown',
        });
    });

    test('loadRelationVocabulary merges the file over the standard relations', async () => {
        const file = path.join(dir, 'relations.json');
        await saveCustomRelations(file, { 'research area': { description: 'Field', domain: 'Researcher', range: 'Unknown' } });

        expect((await loadRelationVocabulary()).size).toBe(5);
        const vocabulary = await loadRelationVocabulary(file);
        expect(vocabulary.size).toBe(6);
        expect(vocabulary.names()[5]).toBe('research area');
    });

    test('saveRelations persists only user relations', async () => {
        const file = path.join(dir, 'relations.json');
        const extractor = new RelationExtractor();
        extractor.addRelation({ relation: 'research area', description: 'Field' });
        await extractor.saveRelations(file);

        expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({
            'research area': { description: 'Field', domain: 'Unknown', range: 'Unknown' },
        });
    });

    test('a failed save rejects and keeps the relation in memory', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, 'not a directory');

        const extractor = new RelationExtractor(new RelationVocabulary());
        extractor.addRelation({ relation: 'research area' });
        const error = await rejectGraphError(extractor.saveRelations(path.join(blocker, 'relations.json')));

        expect(error.code).toBe('CONFIG_SAVE_ERROR');
        expect(extractor.extract('research area')).toHaveLength(1);
    });
});

describe('equivalence group loading', () => {
    let dir: string;
    let warn: jest.SpyInstance;

    beforeEach(async () => {
        dir = await createTempDir();
        warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        warn.mockRestore();
        await removeTempDir(dir);
    });

    test('reads groups in file order', async () => {
        const file = path.join(dir, 'groups.json');
        const groups = [{ canonical: 'employer', variants: ['works for', 'employed by'] }];
        await fs.writeFile(file, JSON.stringify(groups));

        expect(await loadEquivalenceGroups(file)).toEqual(groups);
        expect(warn).not.toHaveBeenCalled();
    });

    test('falls back to the built-in groups', async () => {
        expect(await loadEquivalenceGroups(path.join(dir, 'absent.json'))).toBe(DEFAULT_EQUIVALENCE_GROUPS);
        expect(warn).toHaveBeenCalledTimes(1);
    });
});
