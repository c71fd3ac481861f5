/**
 * Gestalt pattern matching (Ratcliff/Obershelp).
 *
 * The ratio is 2*M / T where T is the combined length of both strings and M
 * the number of characters in the matching blocks found by repeatedly taking
 * the longest common substring and recursing on the pieces to its left and
 * right. Identical strings score 1, strings with nothing in common score 0.
 */

export interface MatchingBlock {
    /** Start in the first sequence */
    a: number;
    /** Start in the second sequence */
    b: number;
    size: number;
}

/** Second-sequence length from which very frequent characters stop seeding matches */
const AUTOJUNK_MIN_LENGTH = 200;

export class SequenceMatcher {
    private readonly a: string[];
    private readonly b: string[];
    private readonly b2j = new Map<string, number[]>();
    private blocks?: MatchingBlock[];

    constructor(a: string, b: string) {
        // Code points, so astral characters count once
        this.a = Array.from(a);
        this.b = Array.from(b);
        this.indexSecond();
    }

    private indexSecond(): void {
        this.b.forEach((ch, j) => {
            const indices = this.b2j.get(ch);
            if (indices) {
                indices.push(j);
            } else {
                this.b2j.set(ch, [j]);
            }
        });

        const n = this.b.length;
        if (n >= AUTOJUNK_MIN_LENGTH) {
            const popularThreshold = Math.floor(n / 100) + 1;
            for (const [ch, indices] of this.b2j) {
                if (indices.length > popularThreshold) {
                    this.b2j.delete(ch);
                }
            }
        }
    }

    /**
     * Longest block with a[i..i+size) == b[j..j+size) inside the given ranges.
     * Among equally long blocks the one starting earliest in `a` wins, then
     * earliest in `b`.
     */
    findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
        const { a, b } = this;
        let besti = alo;
        let bestj = blo;
        let bestsize = 0;

        let j2len = new Map<number, number>();
        for (let i = alo; i < ahi; i++) {
            const next = new Map<number, number>();
            for (const j of this.b2j.get(a[i]) ?? []) {
                if (j < blo) continue;
                if (j >= bhi) break;
                const k = (j2len.get(j - 1) ?? 0) + 1;
                next.set(j, k);
                if (k > bestsize) {
                    besti = i - k + 1;
                    bestj = j - k + 1;
                    bestsize = k;
                }
            }
            j2len = next;
        }

        // Popular characters were left out of the index; grow across them.
        while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
            besti--;
            bestj--;
            bestsize++;
        }
        while (besti + bestsize < ahi && bestj + bestsize < bhi && a[besti + bestsize] === b[bestj + bestsize]) {
            bestsize++;
        }

        return { a: besti, b: bestj, size: bestsize };
    }

    getMatchingBlocks(): MatchingBlock[] {
        if (this.blocks) return this.blocks;

        const found: MatchingBlock[] = [];
        const queue: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]];

        while (queue.length > 0) {
            const range = queue.pop();
            if (!range) break;
            const [alo, ahi, blo, bhi] = range;
            const match = this.findLongestMatch(alo, ahi, blo, bhi);
            if (match.size === 0) continue;

            found.push(match);
            if (alo < match.a && blo < match.b) {
                queue.push([alo, match.a, blo, match.b]);
            }
            if (match.a + match.size < ahi && match.b + match.size < bhi) {
                queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
            }
        }

        found.sort((x, y) => x.a - y.a || x.b - y.b);

        // Merge blocks that touch in both sequences
        const merged: MatchingBlock[] = [];
        for (const block of found) {
            const last = merged[merged.length - 1];
            if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
                last.size += block.size;
            } else {
                merged.push({ ...block });
            }
        }

        this.blocks = merged;
        return merged;
    }

    ratio(): number {
        const total = this.a.length + this.b.length;
        if (total === 0) return 1;
        const matches = this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
        return (2 * matches) / total;
    }
}

export function similarityRatio(a: string, b: string): number {
    return new SequenceMatcher(a, b).ratio();
}
