/**
 * Longest-matching-blocks similarity between two strings.
 *
 * `ratio(a, b) = 2 * M / (len(a) + len(b))`, where M is the total size of the
 * matching blocks found by taking the longest common block and recursing on
 * both sides of it. Ties go to the block starting earliest in `a`, then in `b`.
 * When `b` has 200 or more characters, characters occurring more than
 * `len(b) / 100 + 1` times in it cannot start a block ("popular" characters),
 * though they can still extend one.
 *
 * Strings are compared by code point.
 */

interface Match {
    i: number;
    j: number;
    size: number;
}

const AUTOJUNK_MIN_LENGTH = 200;

export class SequenceMatcher {
    private readonly a: string[];
    private readonly b: string[];
    private readonly b2j = new Map<string, number[]>();

    constructor(a: string, b: string, autojunk = true) {
        this.a = Array.from(a);
        this.b = Array.from(b);

        this.b.forEach((ch, j) => {
            const indices = this.b2j.get(ch);
            if (indices) indices.push(j);
            else this.b2j.set(ch, [j]);
        });

        const n = this.b.length;
        if (autojunk && n >= AUTOJUNK_MIN_LENGTH) {
            const threshold = Math.floor(n / 100) + 1;
            for (const [ch, indices] of [...this.b2j]) {
                if (indices.length > threshold) this.b2j.delete(ch);
            }
        }
    }

    private findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): Match {
        const { a, b } = this;
        let besti = alo;
        let bestj = blo;
        let bestsize = 0;
        let j2len = new Map<number, number>();

        for (let i = alo; i < ahi; i++) {
            const newj2len = new Map<number, number>();
            const ch = a[i];
            const indices = ch === undefined ? undefined : this.b2j.get(ch);
            for (const j of indices ?? []) {
                if (j < blo) continue;
                if (j >= bhi) break;
                const k = (j2len.get(j - 1) ?? 0) + 1;
                newj2len.set(j, k);
                if (k > bestsize) {
                    besti = i - k + 1;
                    bestj = j - k + 1;
                    bestsize = k;
                }
            }
            j2len = newj2len;
        }

        // Popular characters never seed a match but may extend one.
        while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
            besti--;
            bestj--;
            bestsize++;
        }
        while (besti + bestsize < ahi && bestj + bestsize < bhi && a[besti + bestsize] === b[bestj + bestsize]) {
            bestsize++;
        }

        return { i: besti, j: bestj, size: bestsize };
    }

    matchingBlocks(): Match[] {
        const blocks: Match[] = [];
        const queue: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]];
        for (let range = queue.pop(); range; range = queue.pop()) {
            const [alo, ahi, blo, bhi] = range;
            const match = this.findLongestMatch(alo, ahi, blo, bhi);
            if (match.size === 0) continue;
            blocks.push(match);
            if (alo < match.i && blo < match.j) queue.push([alo, match.i, blo, match.j]);
            if (match.i + match.size < ahi && match.j + match.size < bhi) {
                queue.push([match.i + match.size, ahi, match.j + match.size, bhi]);
            }
        }
        return blocks.sort((x, y) => x.i - y.i || x.j - y.j);
    }

    ratio(): number {
        const total = this.a.length + this.b.length;
        if (total === 0) return 1;
        const matches = this.matchingBlocks().reduce((sum, m) => sum + m.size, 0);
        return (2 * matches) / total;
    }
}

export function similarityRatio(a: string, b: string): number {
    return new SequenceMatcher(a, b).ratio();
}
