import { SearchMatch, fuzzyMatch } from "./SearchEngine.js";
import { Matcher } from "./similarity/Matcher.js";

/**
 * Search/replace over text that arrives in pieces, for files too large to
 * hold as one string. Results match the whole-string versions in
 * EditEngine: leftmost, non-overlapping occurrences, first `limit` only.
 */

type Segment =
    | { kind: "text"; text: string }
    | { kind: "match"; line: number };

export interface OccurrenceScan {
    count: number;
    /** Line where the first occurrence starts. */
    firstLine: number;
    /** Line where the last counted occurrence ends. */
    lastLine: number;
}

function countNewlines(text: string): number {
    let count = 0;
    let newline = text.indexOf("\n");
    while (newline !== -1) {
        count++;
        newline = text.indexOf("\n", newline + 1);
    }
    return count;
}

/**
 * Splits the stream into untouched text and occurrences of `searchText`.
 * At most `searchText.length - 1` characters are carried between pieces,
 * enough for an occurrence that straddles a boundary.
 */
async function* segments(pieces: AsyncIterable<string>, searchText: string, limit: number): AsyncGenerator<Segment> {
    const carry = searchText.length - 1;
    const searchNewlines = countNewlines(searchText);
    let buffer = "";
    let line = 1;
    let found = 0;

    for await (const piece of pieces) {
        if (found >= limit) {
            yield { kind: "text", text: piece };
            continue;
        }
        buffer += piece;
        let index = buffer.indexOf(searchText);
        while (index !== -1) {
            const before = buffer.slice(0, index);
            line += countNewlines(before);
            if (before.length > 0) {
                yield { kind: "text", text: before };
            }
            yield { kind: "match", line };
            line += searchNewlines;
            found++;
            buffer = buffer.slice(index + searchText.length);
            index = found < limit ? buffer.indexOf(searchText) : -1;
        }
        if (found >= limit) {
            if (buffer.length > 0) {
                yield { kind: "text", text: buffer };
            }
            buffer = "";
            continue;
        }
        if (buffer.length > carry) {
            const settled = buffer.slice(0, buffer.length - carry);
            line += countNewlines(settled);
            yield { kind: "text", text: settled };
            buffer = buffer.slice(buffer.length - carry);
        }
    }
    if (buffer.length > 0) {
        yield { kind: "text", text: buffer };
    }
}

/** Counts occurrences up to `limit`; stops reading once the limit is reached. */
export async function scanOccurrences(
    pieces: AsyncIterable<string>,
    searchText: string,
    limit: number
): Promise<OccurrenceScan | undefined> {
    // an occurrence ending in "\n" still ends on the line that newline closes
    const span = countNewlines(searchText.slice(0, -1));
    let count = 0;
    let firstLine = 0;
    let lastLine = 0;
    for await (const segment of segments(pieces, searchText, limit)) {
        if (segment.kind !== "match") continue;
        count++;
        if (count === 1) firstLine = segment.line;
        lastLine = segment.line + span;
        if (count >= limit) break;
    }
    return count === 0 ? undefined : { count, firstLine, lastLine };
}

export async function* replacePieces(
    pieces: AsyncIterable<string>,
    searchText: string,
    replaceText: string,
    limit: number
): AsyncGenerator<string> {
    for await (const segment of segments(pieces, searchText, limit)) {
        yield segment.kind === "text" ? segment.text : replaceText;
    }
}

/** Terminator as LineCounter.lineBounds strips it: `\r\n`, `\n`, or a bare trailing `\r`. */
export function lineTerminator(line: string): string {
    if (line.endsWith("\r\n")) return "\r\n";
    if (line.endsWith("\n")) return "\n";
    if (line.endsWith("\r")) return "\r";
    return "";
}

/** Replaces the content of one 1-based line, keeping its terminator. */
export async function* replaceLine(
    lines: AsyncIterable<string>,
    lineNumber: number,
    replaceText: string
): AsyncGenerator<string> {
    let current = 0;
    for await (const line of lines) {
        current++;
        yield current === lineNumber ? replaceText + lineTerminator(line) : line;
    }
}

export async function bestFuzzyLineOf(
    lines: AsyncIterable<string>,
    pattern: string,
    matcher: Matcher,
    threshold: number
): Promise<SearchMatch | undefined> {
    let best: SearchMatch | undefined;
    let lineNumber = 0;
    for await (const line of lines) {
        lineNumber++;
        const candidate = fuzzyMatch(line, lineNumber, pattern, matcher, threshold);
        if (candidate && (!best || candidate.score > best.score)) {
            best = candidate;
        }
    }
    return best;
}

/** Lines `start..end` (1-based, inclusive) with their terminators. */
export async function collectLines(
    lines: AsyncIterable<string>,
    start: number,
    end: number
): Promise<string[]> {
    const window: string[] = [];
    let current = 0;
    for await (const line of lines) {
        current++;
        if (current < start) continue;
        if (current > end) break;
        window.push(line);
    }
    return window;
}
