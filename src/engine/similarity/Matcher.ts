import levenshtein from "fast-levenshtein";
import { FuzzyScorer } from "../../config/LargeFileConfig.js";

/**
 * Similarity of two strings in [0, 1]; 1 means identical. With a `cutoff`,
 * implementations may return 0 as soon as the cutoff is out of reach.
 */
export interface Matcher {
    readonly name: string;
    ratio(a: string, b: string, cutoff?: number): number;
}

/**
 * Normalized indel similarity: `1 - D / (|a| + |b|)` where D counts the
 * insertions and deletions of the shortest edit script. D comes from the
 * greedy Myers O(ND) forward pass, which only needs the furthest-reaching
 * frontier per diagonal.
 */
export class IndelRatioMatcher implements Matcher {
    public readonly name = "indel";

    ratio(a: string, b: string, cutoff = 0): number {
        const total = a.length + b.length;
        if (total === 0) {
            return 1;
        }
        const maxDistance = Math.floor((1 - cutoff) * total + 1e-9);
        if (Math.abs(a.length - b.length) > maxDistance) {
            return 0;
        }
        const distance = IndelRatioMatcher.editDistance(a, b, maxDistance);
        if (distance === undefined) {
            return 0;
        }
        return 1 - distance / total;
    }

    /** Insert/delete distance, or undefined once it exceeds `limit`. */
    static editDistance(a: string, b: string, limit: number = a.length + b.length): number | undefined {
        const n = a.length;
        const m = b.length;
        const offset = n + m + 1;
        const frontier = new Int32Array(2 * offset + 1);
        const bound = Math.min(limit, n + m);

        for (let d = 0; d <= bound; d++) {
            for (let k = -d; k <= d; k += 2) {
                let x: number;
                if (k === -d || (k !== d && frontier[offset + k - 1] < frontier[offset + k + 1])) {
                    x = frontier[offset + k + 1];
                } else {
                    x = frontier[offset + k - 1] + 1;
                }
                let y = x - k;
                while (x < n && y < m && a.charCodeAt(x) === b.charCodeAt(y)) {
                    x++;
                    y++;
                }
                frontier[offset + k] = x;
                if (x >= n && y >= m) {
                    return d;
                }
            }
        }
        return undefined;
    }
}

/** `1 - d / max(|a|, |b|)` over classic Levenshtein distance. */
export class LevenshteinRatioMatcher implements Matcher {
    public readonly name = "levenshtein";

    ratio(a: string, b: string, cutoff = 0): number {
        const longest = Math.max(a.length, b.length);
        if (longest === 0) {
            return 1;
        }
        if (1 - Math.abs(a.length - b.length) / longest < cutoff) {
            return 0;
        }
        return 1 - levenshtein.get(a, b) / longest;
    }
}

export function createMatcher(scorer: FuzzyScorer): Matcher {
    return scorer === "levenshtein" ? new LevenshteinRatioMatcher() : new IndelRatioMatcher();
}
