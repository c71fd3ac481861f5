import fs from 'fs/promises';
import { z } from 'zod';
import { createConfigLoadError } from '../types/errors.js';

/**
 * A canonical relation name and the surface forms treated as identical to it.
 * Groups are consulted in declaration order; the first group listing a
 * variant owns it, even if a later group lists it too.
 */
export interface EquivalenceGroup {
    readonly canonical: string;
    readonly variants: readonly string[];
}

export const DEFAULT_EQUIVALENCE_GROUPS: readonly EquivalenceGroup[] = [
    { canonical: 'birth', variants: ['born', 'date of birth', 'birthdate'] },
    { canonical: 'death', variants: ['died', 'date of death', 'deathdate'] },
    { canonical: 'citizenship', variants: ['nationality', 'country of citizenship', 'origin'] },
    { canonical: 'occupation', variants: ['profession', 'job', 'career'] },
    { canonical: 'work', variants: ['creation', 'notable work', 'achievement'] },
];

const EquivalenceGroupsSchema = z.array(z.object({
    canonical: z.string().min(1),
    variants: z.array(z.string()),
}));

/**
 * Reads an ordered list of `{ canonical, variants }` groups from JSON.
 * On any failure a CONFIG_LOAD_ERROR warning is logged and the built-in
 * groups are returned.
 */
export async function loadEquivalenceGroups(filePath: string): Promise<readonly EquivalenceGroup[]> {
    try {
        const content = await fs.readFile(filePath, 'utf-8');
        return EquivalenceGroupsSchema.parse(JSON.parse(content));
    } catch (e) {
        console.warn(createConfigLoadError(filePath, e).message);
        return DEFAULT_EQUIVALENCE_GROUPS;
    }
}
