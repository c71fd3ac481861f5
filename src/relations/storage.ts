import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { RelationDefinition, RelationTable } from '../types/relation.js';
import { UNKNOWN_TYPE } from '../types/relation.js';
import { createConfigLoadError, createConfigSaveError, describeCause } from '../types/errors.js';
import { RelationVocabulary } from './vocabulary.js';

export const RelationDefinitionSchema = z.object({
    description: z.string().default(''),
    domain: z.string().default(UNKNOWN_TYPE),
    range: z.string().default(UNKNOWN_TYPE),
});

function parseRelationTable(content: string): RelationTable {
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('expected a JSON object mapping relation names to definitions');
    }

    const table: Array<[string, RelationDefinition]> = [];
    for (const [name, value] of Object.entries(parsed)) {
        const result = RelationDefinitionSchema.safeParse(value);
        if (!result.success) {
            const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`);
            throw new Error(`invalid relation '${name}' (${issues.join('; ')})`);
        }
        table.push([name, result.data]);
    }
    // fromEntries keeps names like __proto__ as own keys
    return Object.fromEntries(table);
}

/**
 * Reads a custom relations file: a JSON object mapping relation name to
 * `{ description, domain?, range? }`. Throws CONFIG_LOAD_ERROR when the file
 * cannot be read or any entry is invalid.
 */
export async function readCustomRelations(filePath: string): Promise<RelationTable> {
    try {
        return parseRelationTable(await fs.readFile(filePath, 'utf-8'));
    } catch (e) {
        throw createConfigLoadError(filePath, e);
    }
}

/**
 * Like readCustomRelations, but a failure is reported as a warning and
 * yields an empty table, leaving only the standard relations in effect.
 */
export async function loadCustomRelations(filePath: string): Promise<RelationTable> {
    try {
        return await readCustomRelations(filePath);
    } catch (e) {
        console.warn(describeCause(e));
        return {};
    }
}

export async function saveCustomRelations(filePath: string, table: RelationTable): Promise<void> {
    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, JSON.stringify(table, null, 2) + '\n', 'utf-8');
    } catch (e) {
        throw createConfigSaveError(filePath, e);
    }
}

/**
 * Standard relations merged with the custom file, when one is given.
 */
export async function loadRelationVocabulary(filePath?: string): Promise<RelationVocabulary> {
    if (!filePath) return new RelationVocabulary();
    return new RelationVocabulary(await loadCustomRelations(filePath));
}
