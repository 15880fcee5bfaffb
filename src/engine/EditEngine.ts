import * as path from "path";
import { FileAccess, splitLines } from "./FileAccess.js";
import { FileSession, SessionCache } from "./SessionCache.js";
import { SearchEngine, bestFuzzyLine } from "./SearchEngine.js";
import { BackupStore } from "./BackupStore.js";
import { LineCounter } from "./LineCounter.js";
import { Matcher } from "./similarity/Matcher.js";
import { renderUnifiedPreview } from "./Diff.js";
import { NoopPathLock, PathLock } from "./EditLock.js";
import {
    bestFuzzyLineOf,
    collectLines,
    lineTerminator,
    replaceLine,
    replacePieces,
    scanOccurrences
} from "./StreamedEdit.js";
import { EditOptions, EditResult } from "../types.js";
import { EditError, SearchError, describeError, toAccessError } from "../errors/LargeFileErrors.js";
import { resolvePath } from "../utils/PathResolver.js";
import { createLogger } from "../utils/StructuredLogger.js";

export const MAX_EDIT_TEXT_LENGTH = 10_000;
const PREVIEW_CONTEXT_LINES = 3;

const logger = createLogger("EditEngine");

interface EditRequest {
    canonicalPath: string;
    searchText: string;
    replaceText: string;
    fuzzy: boolean;
    maxReplacements: number;
}

interface PlannedEdit {
    preview: string;
    changesMade: number;
    lineNumber: number;
    similarityUsed: number;
    matchKind: "exact" | "fuzzy";
    /** Writes the edited content; the backup is already taken. */
    commit(): Promise<void>;
}

/** Replaces the first `limit` occurrences; undefined when there are none. */
export function replaceOccurrences(
    content: string,
    searchText: string,
    replaceText: string,
    limit: number
): { updated: string; count: number; firstIndex: number } | undefined {
    const pieces: string[] = [];
    let cursor = 0;
    let count = 0;
    let firstIndex = -1;
    while (count < limit) {
        const index = content.indexOf(searchText, cursor);
        if (index === -1) break;
        if (firstIndex === -1) firstIndex = index;
        pieces.push(content.slice(cursor, index), replaceText);
        cursor = index + searchText.length;
        count++;
    }
    if (count === 0) {
        return undefined;
    }
    pieces.push(content.slice(cursor));
    return { updated: pieces.join(""), count, firstIndex };
}

export function validateEditParams(searchText: string, replaceText: string, maxReplacements: number): void {
    if (searchText.length === 0) {
        throw new EditError("INVALID_PARAMS", "Search text must not be empty");
    }
    if (searchText.length > MAX_EDIT_TEXT_LENGTH || replaceText.length > MAX_EDIT_TEXT_LENGTH) {
        throw new EditError(
            "INVALID_PARAMS",
            `Search and replace text are limited to ${MAX_EDIT_TEXT_LENGTH} characters`
        );
    }
    if (searchText === replaceText) {
        throw new EditError("INVALID_PARAMS", "Search text and replace text are identical");
    }
    if (!Number.isSafeInteger(maxReplacements) || maxReplacements < 1) {
        throw new EditError("INVALID_PARAMS", `maxReplacements must be a positive integer, got ${maxReplacements}`);
    }
}

/**
 * Search/replace editing. An edit moves through validated, located, then
 * either returns its preview or is backed up and written. Nothing touches
 * the file until the backup exists.
 *
 * Files under the streaming strategy are never held whole. They are scanned
 * piece by piece and rewritten through a streamed atomic write; their
 * preview comes from the lines around the change.
 */
export class EditEngine {
    constructor(
        private readonly fileAccess: FileAccess,
        private readonly sessions: SessionCache,
        private readonly search: SearchEngine,
        private readonly backups: BackupStore,
        private readonly lock: PathLock = new NoopPathLock()
    ) {}

    public async replace(
        filePath: string,
        searchText: string,
        replaceText: string,
        options: EditOptions = {}
    ): Promise<EditResult> {
        const fuzzy = options.fuzzy ?? false;
        const preview = options.preview ?? true;
        const maxReplacements = options.maxReplacements ?? 1;
        validateEditParams(searchText, replaceText, maxReplacements);

        const request: EditRequest = { canonicalPath: resolvePath(filePath), searchText, replaceText, fuzzy, maxReplacements };
        const run = () => this.locateAndApply(request, preview);
        return preview ? run() : this.lock.withLock(request.canonicalPath, run);
    }

    private async locateAndApply(request: EditRequest, preview: boolean): Promise<EditResult> {
        const { canonicalPath } = request;
        const plan = await this.plan(request);
        if (!plan) {
            return {
                success: false,
                preview: `No match found for search text in ${path.basename(canonicalPath)}`,
                changesMade: 0,
                lineNumber: 0,
                similarityUsed: 0,
                matchKind: "none"
            };
        }

        const result: EditResult = {
            success: true,
            preview: plan.preview,
            changesMade: plan.changesMade,
            lineNumber: plan.lineNumber,
            similarityUsed: plan.similarityUsed,
            matchKind: plan.matchKind
        };
        if (preview) {
            return result;
        }

        const log = logger.child({ filePath: canonicalPath });
        const backupPath = await this.backups.backup(canonicalPath);
        try {
            await plan.commit();
        } catch (error) {
            log.error("Edit write failed", { backupPath, error: describeError(error) });
            throw new EditError("WRITE_FAILED", `Failed to write ${canonicalPath}: ${describeError(error)}`, {
                filePath: canonicalPath,
                cause: error
            });
        } finally {
            this.sessions.invalidate(canonicalPath);
        }

        log.info("Edit committed", {
            matchKind: plan.matchKind,
            changesMade: plan.changesMade,
            lineNumber: plan.lineNumber,
            backupPath
        });
        return { ...result, backupCreated: backupPath };
    }

    /** Locates the edit; any failure to read the file is a READ_FAILED EditError. */
    private async plan(request: EditRequest): Promise<PlannedEdit | undefined> {
        const { canonicalPath } = request;
        try {
            const session = await this.sessions.load(canonicalPath);
            return session.strategy === "streaming"
                ? await this.planStreamed(session, request)
                : await this.planInMemory(session, request);
        } catch (error) {
            if (error instanceof EditError) {
                throw error;
            }
            const cause = error instanceof SearchError ? error : toAccessError(error, canonicalPath, "read");
            throw new EditError("READ_FAILED", cause.message, { filePath: canonicalPath, cause });
        }
    }

    private async planInMemory(session: FileSession, request: EditRequest): Promise<PlannedEdit | undefined> {
        const { canonicalPath, searchText, replaceText } = request;
        const content = await this.fileAccess.read(canonicalPath, session.encoding, session.strategy);

        const exact = replaceOccurrences(content, searchText, replaceText, request.maxReplacements);
        if (exact) {
            return {
                preview: this.preview(canonicalPath, content, exact.updated),
                changesMade: exact.count,
                lineNumber: new LineCounter(content).lineNumberAt(exact.firstIndex),
                similarityUsed: 1,
                matchKind: "exact",
                commit: () => this.fileAccess.write(canonicalPath, exact.updated, session.encoding)
            };
        }
        if (!request.fuzzy) {
            return undefined;
        }

        const best = bestFuzzyLine(splitLines(content), searchText, this.matcherFor(canonicalPath), this.search.threshold);
        if (!best) {
            return undefined;
        }
        // the whole line content is replaced; its terminator stays
        const bounds = new LineCounter(content).lineBounds(best.lineNumber);
        const updated = content.slice(0, bounds.start) + replaceText + content.slice(bounds.end);
        return {
            preview: this.preview(canonicalPath, content, updated),
            changesMade: 1,
            lineNumber: best.lineNumber,
            similarityUsed: best.score,
            matchKind: "fuzzy",
            commit: () => this.fileAccess.write(canonicalPath, updated, session.encoding)
        };
    }

    private async planStreamed(session: FileSession, request: EditRequest): Promise<PlannedEdit | undefined> {
        const { canonicalPath, searchText, replaceText } = request;
        const { encoding } = session;
        const chunks = () => this.fileAccess.chunks(canonicalPath, encoding);
        const lines = () => this.fileAccess.lines(canonicalPath, encoding, "streaming");

        const exact = await scanOccurrences(chunks(), searchText, request.maxReplacements);
        if (exact) {
            const preview = await this.excerptPreview(canonicalPath, lines, exact.firstLine, exact.lastLine, (excerpt) => {
                const text = excerpt.join("");
                return replaceOccurrences(text, searchText, replaceText, exact.count)?.updated ?? text;
            });
            return {
                preview,
                changesMade: exact.count,
                lineNumber: exact.firstLine,
                similarityUsed: 1,
                matchKind: "exact",
                commit: () => this.fileAccess.writeStream(
                    canonicalPath,
                    replacePieces(chunks(), searchText, replaceText, exact.count),
                    encoding
                )
            };
        }
        if (!request.fuzzy) {
            return undefined;
        }

        const best = await bestFuzzyLineOf(lines(), searchText, this.matcherFor(canonicalPath), this.search.threshold);
        if (!best) {
            return undefined;
        }
        const target = best.lineNumber;
        const preview = await this.excerptPreview(canonicalPath, lines, target, target, (excerpt, start) =>
            excerpt
                .map((line, index) => (start + index === target ? replaceText + lineTerminator(line) : line))
                .join("")
        );
        return {
            preview,
            changesMade: 1,
            lineNumber: target,
            similarityUsed: best.score,
            matchKind: "fuzzy",
            commit: () => this.fileAccess.writeStream(canonicalPath, replaceLine(lines(), target, replaceText), encoding)
        };
    }

    private preview(canonicalPath: string, before: string, after: string): string {
        return renderUnifiedPreview(before, after, PREVIEW_CONTEXT_LINES, path.basename(canonicalPath)).diff;
    }

    /**
     * Preview rendered from the changed lines plus context only. One line past
     * the trailing context is read, since replacing a text that ends in a line
     * break joins the following line onto the changed one.
     */
    private async excerptPreview(
        canonicalPath: string,
        lines: () => AsyncIterable<string>,
        firstLine: number,
        lastLine: number,
        apply: (excerpt: string[], start: number) => string
    ): Promise<string> {
        const start = Math.max(1, firstLine - PREVIEW_CONTEXT_LINES);
        const excerpt = await collectLines(lines(), start, lastLine + PREVIEW_CONTEXT_LINES + 1);
        return renderUnifiedPreview(
            excerpt.join(""),
            apply(excerpt, start),
            PREVIEW_CONTEXT_LINES,
            path.basename(canonicalPath),
            start - 1
        ).diff;
    }

    private matcherFor(canonicalPath: string): Matcher {
        try {
            return this.search.requireMatcher(canonicalPath);
        } catch (error) {
            throw new EditError("MATCHER_UNAVAILABLE", describeError(error), { filePath: canonicalPath, cause: error });
        }
    }
}
