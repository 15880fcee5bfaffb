import { FileAccess, stripLineTerminator } from "./FileAccess.js";
import { SessionCache } from "./SessionCache.js";
import { Matcher } from "./similarity/Matcher.js";
import { SearchError } from "../errors/LargeFileErrors.js";
import { resolvePath } from "../utils/PathResolver.js";
import { createLogger } from "../utils/StructuredLogger.js";

export type MatchKind = "exact" | "fuzzy";

export interface MatchSpan {
    start: number;
    end: number;
}

export interface SearchMatch {
    /** 1-based. */
    lineNumber: number;
    /** Line text without its terminator. */
    lineContent: string;
    /** 1 for exact matches, [threshold, 1) for fuzzy ones. */
    score: number;
    kind: MatchKind;
    span?: MatchSpan;
}

export interface FindOptions {
    fuzzy?: boolean;
    /** Applied after exact and fuzzy results are merged. */
    maxResults?: number;
}

export interface SearchEngineOptions {
    fuzzyThreshold: number;
}

/** First case-sensitive occurrence of `pattern` on a line, or undefined. */
export function exactMatch(line: string, lineNumber: number, pattern: string): SearchMatch | undefined {
    const content = stripLineTerminator(line);
    const start = content.indexOf(pattern);
    if (start === -1) {
        return undefined;
    }
    return {
        lineNumber,
        lineContent: content,
        score: 1,
        kind: "exact",
        span: { start, end: start + pattern.length }
    };
}

/** Scores the trimmed line against `pattern`; undefined below `threshold`. */
export function fuzzyMatch(
    line: string,
    lineNumber: number,
    pattern: string,
    matcher: Matcher,
    threshold: number
): SearchMatch | undefined {
    const content = stripLineTerminator(line);
    const score = matcher.ratio(pattern, content.trim(), threshold);
    if (score < threshold) {
        return undefined;
    }
    return { lineNumber, lineContent: content, score, kind: "fuzzy" };
}

/**
 * Exact entries supersede fuzzy ones on the same line. Ordered by line, then
 * by descending score.
 */
export function mergeMatches(exact: SearchMatch[], fuzzy: SearchMatch[]): SearchMatch[] {
    const exactLines = new Set(exact.map((match) => match.lineNumber));
    const merged = [...exact, ...fuzzy.filter((match) => !exactLines.has(match.lineNumber))];
    return merged.sort((a, b) => a.lineNumber - b.lineNumber || b.score - a.score);
}

/** Highest scoring fuzzy line; the earliest line wins a tie. */
export function bestFuzzyLine(
    lines: Iterable<string>,
    pattern: string,
    matcher: Matcher,
    threshold: number
): SearchMatch | undefined {
    let best: SearchMatch | undefined;
    let lineNumber = 0;
    for (const line of lines) {
        lineNumber++;
        const candidate = fuzzyMatch(line, lineNumber, pattern, matcher, threshold);
        if (candidate && (!best || candidate.score > best.score)) {
            best = candidate;
        }
    }
    return best;
}

const logger = createLogger("SearchEngine");

export class SearchEngine {
    private readonly fuzzyThreshold: number;

    constructor(
        private readonly fileAccess: FileAccess,
        private readonly sessions: SessionCache,
        private readonly matcher: Matcher | undefined,
        options: SearchEngineOptions
    ) {
        this.fuzzyThreshold = options.fuzzyThreshold;
    }

    public get threshold(): number {
        return this.fuzzyThreshold;
    }

    public get hasMatcher(): boolean {
        return this.matcher !== undefined;
    }

    /** The configured matcher; fuzzy callers must go through this. */
    public requireMatcher(filePath?: string): Matcher {
        if (!this.matcher) {
            throw new SearchError(
                "MATCHER_UNAVAILABLE",
                "Fuzzy matching is unavailable: no similarity matcher is configured",
                { filePath }
            );
        }
        return this.matcher;
    }

    public async find(filePath: string, pattern: string, options: FindOptions = {}): Promise<SearchMatch[]> {
        if (pattern.length === 0) {
            throw new SearchError("INVALID_PATTERN", "Search pattern must not be empty", { filePath });
        }
        const fuzzy = options.fuzzy ?? false;
        const matcher = fuzzy ? this.requireMatcher(filePath) : undefined;

        const canonicalPath = resolvePath(filePath);
        const exact: SearchMatch[] = [];
        const approximate: SearchMatch[] = [];

        try {
            const session = await this.sessions.load(canonicalPath);
            let lineNumber = 0;
            for await (const line of this.fileAccess.lines(canonicalPath, session.encoding, session.strategy)) {
                lineNumber++;
                const hit = exactMatch(line, lineNumber, pattern);
                if (hit) {
                    exact.push(hit);
                    continue;
                }
                if (matcher) {
                    const near = fuzzyMatch(line, lineNumber, pattern, matcher, this.fuzzyThreshold);
                    if (near) {
                        approximate.push(near);
                    }
                }
            }
        } catch (error) {
            throw new SearchError(
                "READ_FAILED",
                `Cannot search ${canonicalPath}: ${error instanceof Error ? error.message : String(error)}`,
                { filePath: canonicalPath, cause: error }
            );
        }

        const merged = mergeMatches(exact, approximate);
        logger.debug("Search completed", {
            filePath: canonicalPath,
            exact: exact.length,
            fuzzy: approximate.length
        });
        return options.maxResults !== undefined ? merged.slice(0, Math.max(0, options.maxResults)) : merged;
    }
}
