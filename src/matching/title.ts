/**
 * Canonical comparison key for a title: lowercase, whitespace collapsed, trimmed.
 * Absent titles become the empty string.
 */
export function normalizeTitle(title: string | null | undefined): string {
    if (title === null || title === undefined) return '';
    return title.toLowerCase().trim().replace(/\s+/g, ' ');
}

/**
 * Insertion/deletion edit distance (no substitutions), i.e. |a| + |b| - 2 * LCS(a, b).
 */
export function indelDistance(a: string, b: string): number {
    const m = a.length;
    const n = b.length;

    if (m === 0) return n;
    if (n === 0) return m;

    // Rolling rows of the LCS table
    let prev = new Array<number>(n + 1).fill(0);
    let curr = new Array<number>(n + 1).fill(0);

    for (let i = 1; i <= m; i++) {
        const ca = a.charCodeAt(i - 1);
        for (let j = 1; j <= n; j++) {
            if (ca === b.charCodeAt(j - 1)) {
                curr[j] = (prev[j - 1] ?? 0) + 1;
            } else {
                curr[j] = Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
            }
        }
        [prev, curr] = [curr, prev];
    }

    const lcs = prev[n] ?? 0;
    return m + n - 2 * lcs;
}

/** numerator / denominator rounded to an integer, ties to the even neighbour. */
function roundHalfEven(numerator: number, denominator: number): number {
    const quotient = Math.floor(numerator / denominator);
    const twiceRemainder = 2 * (numerator - quotient * denominator);
    if (twiceRemainder > denominator) return quotient + 1;
    if (twiceRemainder < denominator) return quotient;
    return quotient % 2 === 0 ? quotient : quotient + 1;
}

/**
 * Symmetric similarity score in [0, 100].
 * 100 = identical; an empty string on either side scores 0.
 * Exact .5 scores round to the even integer (62.5 -> 62, 63.5 -> 64).
 */
export function similarityRatio(a: string, b: string): number {
    if (a.length === 0 || b.length === 0) return 0;
    if (a === b) return 100;

    const total = a.length + b.length;
    return roundHalfEven(100 * (total - indelDistance(a, b)), total);
}
