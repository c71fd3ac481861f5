import type { RelationRecord } from '../types/relation.js';
import { DEFAULTS, SimilarityThresholdSchema } from '../types/options.js';
import { createInvalidArgumentError } from '../types/errors.js';
import { DEFAULT_EQUIVALENCE_GROUPS, EquivalenceGroup } from './equivalence.js';
import { similarityRatio } from './similarity.js';

export interface OntologyMatcherOptions {
    /** Minimum ratio for two names to count as similar (default 0.8) */
    similarityThreshold?: number;
    /** Ordered equivalence groups; first match wins */
    groups?: readonly EquivalenceGroup[];
}

function normalize(value: string): string {
    return value.trim().toLowerCase();
}

/**
 * Normalizes relation names against a small ontology.
 *
 * Two names are similar when, after trimming and lowercasing, they are equal,
 * are both variants of the same equivalence group, or their similarity ratio
 * reaches the threshold. The checks run in that order, so group members match
 * however far apart they are character-wise.
 */
export class OntologyMatcher {
    private readonly threshold: number;
    private readonly groups: ReadonlyArray<{ canonical: string; variants: ReadonlySet<string> }>;

    constructor(options: OntologyMatcherOptions = {}) {
        const threshold = options.similarityThreshold ?? DEFAULTS.similarityThreshold;
        if (!SimilarityThresholdSchema.safeParse(threshold).success) {
            throw createInvalidArgumentError('similarity threshold', threshold, 'a number between 0 and 1');
        }
        this.threshold = threshold;
        this.groups = (options.groups ?? DEFAULT_EQUIVALENCE_GROUPS).map(group => ({
            canonical: group.canonical,
            variants: new Set(group.variants.map(normalize)),
        }));
    }

    getThreshold(): number {
        return this.threshold;
    }

    getGroups(): EquivalenceGroup[] {
        return this.groups.map(group => ({
            canonical: group.canonical,
            variants: Array.from(group.variants),
        }));
    }

    /** Similarity ratio of the normalized names */
    ratio(a: string, b: string): number {
        return similarityRatio(normalize(a), normalize(b));
    }

    similar(a: string, b: string): boolean {
        const left = normalize(a);
        const right = normalize(b);

        if (left === right) {
            return true;
        }

        for (const group of this.groups) {
            if (group.variants.has(left) && group.variants.has(right)) {
                return true;
            }
        }

        return similarityRatio(left, right) >= this.threshold;
    }

    /**
     * Canonical name of the first group listing `name` as a variant.
     */
    canonicalize(name: string): string | undefined {
        const key = normalize(name);
        return this.groups.find(group => group.variants.has(key))?.canonical;
    }

    /**
     * Rewrites each record's relation to its group's canonical name.
     * Records outside every group are returned as they are. Output order and
     * length equal the input's.
     */
    match(records: readonly RelationRecord[]): RelationRecord[] {
        return records.map(record => {
            const canonical = this.canonicalize(record.relation);
            return canonical === undefined ? record : { ...record, relation: canonical };
        });
    }

    /**
     * Maps each source to the target with the highest ratio, if that ratio
     * reaches the threshold. Ties go to the earlier target. Sources without
     * a qualifying target are left out.
     */
    mapProperties(sources: readonly string[], targets: readonly string[]): Map<string, string> {
        const mapping = new Map<string, string>();

        for (const source of sources) {
            let best: string | undefined;
            let bestRatio = -1;

            for (const target of targets) {
                const ratio = this.ratio(source, target);
                if (ratio > bestRatio) {
                    best = target;
                    bestRatio = ratio;
                }
            }

            if (best !== undefined && bestRatio >= this.threshold) {
                mapping.set(source, best);
            }
        }

        return mapping;
    }

    /**
     * Every (source, target) pair the `similar` rule accepts, sources outer.
     */
    findSimilarProperties(sources: readonly string[], targets: readonly string[]): Array<[string, string]> {
        const pairs: Array<[string, string]> = [];
        for (const source of sources) {
            for (const target of targets) {
                if (this.similar(source, target)) {
                    pairs.push([source, target]);
                }
            }
        }
        return pairs;
    }
}
