// similarity.ts — gestalt pattern matching (Ratcliff/Obershelp)
//
// ratio = 2 * M / (len(a) + len(b)), where M is the total size of the matching
// blocks found by taking the longest common substring and recursing on both
// sides of it. No junk heuristics: symbols are short.

interface Block {
    i: number;
    j: number;
    size: number;
}

/** Longest common substring of a[alo..ahi) and b[blo..bhi); earliest in a, then in b. */
function longestMatch(
    a: string,
    b: string,
    b2j: Map<string, number[]>,
    alo: number,
    ahi: number,
    blo: number,
    bhi: number
): Block {
    let best: Block = { i: alo, j: blo, size: 0 };
    let runs = new Map<number, number>(); // j -> length of match ending at (i-1, j)

    for (let i = alo; i < ahi; i++) {
        const next = new Map<number, number>();
        for (const j of b2j.get(a[i]) ?? []) {
            if (j < blo) continue;
            if (j >= bhi) break;
            const k = (runs.get(j - 1) ?? 0) + 1;
            next.set(j, k);
            if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k };
        }
        runs = next;
    }
    return best;
}

function matchedCharacters(a: string, b: string): number {
    const b2j = new Map<string, number[]>();
    for (let j = 0; j < b.length; j++) {
        const list = b2j.get(b[j]) ?? [];
        list.push(j);
        b2j.set(b[j], list);
    }

    let total = 0;
    const stack: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
    while (stack.length > 0) {
        const frame = stack.pop();
        if (!frame) break;
        const [alo, ahi, blo, bhi] = frame;
        const m = longestMatch(a, b, b2j, alo, ahi, blo, bhi);
        if (m.size === 0) continue;
        total += m.size;
        if (alo < m.i && blo < m.j) stack.push([alo, m.i, blo, m.j]);
        if (m.i + m.size < ahi && m.j + m.size < bhi) stack.push([m.i + m.size, ahi, m.j + m.size, bhi]);
    }
    return total;
}

/** Similarity in [0, 1]; 1 for identical strings (including two empty ones). */
export function similarityRatio(a: string, b: string): number {
    const length = a.length + b.length;
    if (length === 0) return 1;
    return (2 * matchedCharacters(a, b)) / length;
}
