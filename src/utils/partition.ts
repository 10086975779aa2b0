/**
 * Split `items` into `n` contiguous chunks whose sizes differ by at most one.
 * Earlier chunks take the remainder; chunks may be empty when `n > items.length`.
 *
 * divide([1, 2, 3, 4, 5], 2) → [[1, 2, 3], [4, 5]]
 */
export function divide<T>(items: readonly T[], n: number): T[][] {
    if (!Number.isInteger(n) || n < 1) {
        throw new RangeError(`Number of chunks must be a positive integer, got ${n}`);
    }

    const base = Math.floor(items.length / n);
    const extra = items.length % n;
    const chunks: T[][] = [];

    let start = 0;
    for (let i = 0; i < n; i++) {
        const size = base + (i < extra ? 1 : 0);
        chunks.push(items.slice(start, start + size));
        start += size;
    }

    return chunks;
}
