/**
 * Best candidate for one title, as produced by `matchPartition`.
 * `candidateIndex` is -1 when there were no candidates.
 */
export interface PartitionMatch {
    candidateIndex: number;
    score: number;
}

/**
 * Clean and normalize a title for comparison.
 */
export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')               // Collapse whitespace
        .trim();
}

/**
 * Find the best candidate for every title.
 *
 * The score of a (title, candidate) pair is `1 - d / |title|`, where `d` is
 * the smallest edit distance between the title and any substring of the
 * candidate (semi-global Levenshtein, O(|title| * |candidate|)). A title that
 * appears verbatim inside a candidate scores 1; the score never leaves [0, 1].
 * Ties go to the lower candidate index.
 *
 * Inputs must already be normalized. This function is shipped to worker
 * threads as source text, so it must stay self-contained: no imports, no
 * closures, no helper functions.
 */
export function matchPartition(titles: readonly string[], candidates: readonly string[]): PartitionMatch[] {
    const results: PartitionMatch[] = [];

    for (let t = 0; t < titles.length; t++) {
        const title = titles[t] ?? '';
        const m = title.length;
        let previous = new Int32Array(m + 1);
        let current = new Int32Array(m + 1);
        let bestScore = 0;
        let bestIndex = -1;

        for (let c = 0; c < candidates.length; c++) {
            const text = candidates[c] ?? '';

            // Column j = 0: matching a title prefix against nothing
            for (let i = 0; i <= m; i++) previous[i] = i;
            let distance = m;

            for (let j = 1; j <= text.length && distance > 0; j++) {
                const ch = text.charCodeAt(j - 1);
                // Row 0 is free: the match may start anywhere in the candidate
                current[0] = 0;
                for (let i = 1; i <= m; i++) {
                    const substitution = (previous[i - 1] ?? 0) + (title.charCodeAt(i - 1) === ch ? 0 : 1);
                    const deletion = (current[i - 1] ?? 0) + 1;
                    const insertion = (previous[i] ?? 0) + 1;
                    current[i] = Math.min(substitution, deletion, insertion);
                }
                distance = Math.min(distance, current[m] ?? m);
                const swap = previous;
                previous = current;
                current = swap;
            }

            const score = m === 0 ? 0 : 1 - distance / m;
            if (bestIndex === -1 || score > bestScore) {
                bestScore = score;
                bestIndex = c;
            }
            if (bestScore === 1) break;
        }

        results.push({ candidateIndex: bestIndex, score: bestScore });
    }

    return results;
}

/**
 * Similarity of `title` against one `candidate`, both raw.
 */
export function titleSimilarity(title: string, candidate: string): number {
    const [match] = matchPartition([normalizeTitle(title)], [normalizeTitle(candidate)]);
    return match?.score ?? 0;
}
