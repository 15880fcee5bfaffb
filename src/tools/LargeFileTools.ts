import * as path from "path";
import { LargeFileConfig } from "../config/LargeFileConfig.js";
import { IFileSystem, NodeFileSystem } from "../platform/FileSystem.js";
import { AtomicWriter } from "../platform/AtomicWriter.js";
import { StrategySelector } from "../engine/StrategySelector.js";
import { FileAccess, stripLineTerminator } from "../engine/FileAccess.js";
import { FileSession, SessionCache } from "../engine/SessionCache.js";
import { SearchEngine, SearchMatch } from "../engine/SearchEngine.js";
import { EditEngine } from "../engine/EditEngine.js";
import { BackupStore } from "../engine/BackupStore.js";
import { createPathLock } from "../engine/EditLock.js";
import { Matcher, createMatcher } from "../engine/similarity/Matcher.js";
import { ChardetEncodingDetector, EncodingResolver } from "../encoding/EncodingResolver.js";
import {
    BudgetedOutlineProvider,
    OutlineProvider,
    PatternOutlineProvider,
    findEnclosingItem,
    flattenOutline
} from "../outline/OutlineProvider.js";
import { EditResult, FileOverview, OutlineItem, OutlineKind, ReadContentResult, SearchHit } from "../types.js";
import { SearchError, describeError } from "../errors/LargeFileErrors.js";
import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";
import { resolvePath } from "../utils/PathResolver.js";
import { createLogger } from "../utils/StructuredLogger.js";
import {
    EditArgsSchema,
    OverviewArgsSchema,
    ReadArgsSchema,
    SearchArgsSchema,
    ToolName
} from "./ToolSchemas.js";

export const TRUNCATION_SUFFIX = "...[truncated]";
export const LINE_WINDOW = 20;
export const PATTERN_WINDOW_RADIUS = 10;
const MAX_OUTLINE_HINTS = 10;

const HINTS_BY_EXTENSION: Record<string, string[]> = {
    ".py": ["def ", "class ", "import ", "TODO"],
    ".ts": ["function ", "class ", "interface ", "export ", "import "],
    ".js": ["function ", "class ", "export ", "import ", "require("],
    ".go": ["func ", "type ", "package ", "TODO"],
    ".rs": ["fn ", "struct ", "impl ", "use ", "TODO"],
    ".java": ["class ", "public ", "import ", "TODO"],
    ".md": ["# ", "## ", "```"]
};
const EXTENSION_ALIASES: Record<string, string> = {
    ".pyi": ".py",
    ".tsx": ".ts",
    ".mts": ".ts",
    ".cts": ".ts",
    ".jsx": ".js",
    ".mjs": ".js",
    ".cjs": ".js",
    ".markdown": ".md"
};
const SMALL_FILE_BYTES = 10_000;
const CALLABLE_KINDS: ReadonlySet<OutlineKind> = new Set<OutlineKind>(["function", "method"]);

const isCallable = (item: OutlineItem): boolean => CALLABLE_KINDS.has(item.kind);

export type ToolResponse = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

export interface SearchContentResult {
    results: SearchHit[];
    warnings?: string[];
}

export type EditContentResult = EditResult & { warnings?: string[] };

/**
 * Everything the tools need, wired once per process.
 */
export interface LargeFileServices {
    config: LargeFileConfig;
    fileAccess: FileAccess;
    sessions: SessionCache;
    search: SearchEngine;
    edit: EditEngine;
    outline?: OutlineProvider;
}

export interface ServiceOverrides {
    fileSystem?: IFileSystem;
    /** `null` runs without a similarity matcher. */
    matcher?: Matcher | null;
    outline?: OutlineProvider | null;
}

export function createServices(config: LargeFileConfig, overrides: ServiceOverrides = {}): LargeFileServices {
    const fileSystem = overrides.fileSystem ?? new NodeFileSystem();
    const selector = new StrategySelector({
        memoryThreshold: config.memoryThreshold,
        mmapThreshold: config.mmapThreshold
    });
    const fileAccess = new FileAccess(fileSystem, selector, config.streamingChunkSize, new AtomicWriter(fileSystem));
    const encodings = new EncodingResolver(fileSystem, new ChardetEncodingDetector());
    const sessions = new SessionCache(fileSystem, fileAccess, encodings, {
        maxLineLength: config.maxLineLength,
        maxSessions: config.sessionCacheSize
    });
    const matcher = overrides.matcher === null ? undefined : overrides.matcher ?? createMatcher(config.fuzzyScorer);
    const search = new SearchEngine(fileAccess, sessions, matcher, { fuzzyThreshold: config.fuzzyThreshold });
    const backups = new BackupStore(fileSystem, config.backupDir, { chunkSize: config.streamingChunkSize });
    const edit = new EditEngine(fileAccess, sessions, search, backups, createPathLock(config.editLock));

    let outline: OutlineProvider | undefined;
    if (config.enableOutline && overrides.outline !== null) {
        outline = new BudgetedOutlineProvider(overrides.outline ?? new PatternOutlineProvider(), config.outlineTimeout * 1000);
    }
    return { config, fileAccess, sessions, search, edit, outline };
}

export function truncateLine(text: string, limit: number): { text: string; truncated: boolean } {
    if (text.length <= limit) {
        return { text, truncated: false };
    }
    return { text: text.slice(0, limit) + TRUNCATION_SUFFIX, truncated: true };
}

export function searchHintsFor(filePath: string, fileSize: number, outline: OutlineItem[]): string[] {
    const hints: string[] = [];
    for (const item of flattenOutline(outline)) {
        if (hints.length >= MAX_OUTLINE_HINTS) break;
        if (!hints.includes(item.name)) hints.push(item.name);
    }
    const extension = path.extname(filePath).toLowerCase();
    const byKind = HINTS_BY_EXTENSION[EXTENSION_ALIASES[extension] ?? extension]
        ?? (fileSize < SMALL_FILE_BYTES ? ["def ", "class ", "import ", "function"] : ["def ", "class ", "TODO", "FIXME"]);
    for (const hint of byKind) {
        if (!hints.includes(hint)) hints.push(hint);
    }
    return hints;
}

const logger = createLogger("LargeFileTools");

/**
 * The four boundary operations. Arguments arrive unvalidated from the
 * transport; results are plain JSON-able objects.
 */
export class LargeFileTools {
    constructor(private readonly services: LargeFileServices) {}

    public async call(name: ToolName, args: unknown): Promise<ToolResponse> {
        try {
            const result = await this.dispatch(name, args);
            return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
        } catch (error) {
            const payload = ErrorEnhancer.toPayload(error);
            if (payload.code === "INTERNAL_ERROR") {
                logger.error("Unexpected tool failure", { tool: name, error: describeError(error) });
            } else {
                logger.warn("Tool call failed", { tool: name, code: payload.code, error: payload.message });
            }
            return {
                content: [{ type: "text", text: JSON.stringify({ error: payload }, null, 2) }],
                isError: true
            };
        }
    }

    private dispatch(name: ToolName, args: unknown): Promise<unknown> {
        switch (name) {
            case "get_overview":
                return this.getOverview(args);
            case "search_content":
                return this.searchContent(args);
            case "read_content":
                return this.readContent(args);
            case "edit_content":
                return this.editContent(args);
        }
    }

    public async getOverview(args: unknown): Promise<FileOverview> {
        const { absolute_file_path } = OverviewArgsSchema.parse(args);
        const filePath = resolvePath(absolute_file_path);
        const session = await this.services.sessions.load(filePath);
        const outline = await this.outlineFor(filePath, session);
        return {
            lineCount: session.lineCount,
            fileSize: session.fileSize,
            encoding: session.encoding,
            hasLongLines: session.hasLongLines,
            outline,
            searchHints: searchHintsFor(filePath, session.fileSize, outline)
        };
    }

    public async searchContent(args: unknown): Promise<SearchContentResult> {
        const parsed = SearchArgsSchema.parse(args);
        const { config, search, sessions } = this.services;
        const filePath = resolvePath(parsed.absolute_file_path);
        const maxResults = parsed.max_results ?? config.maxSearchResults;
        const contextLines = parsed.context_lines ?? config.contextLines;
        const warnings: string[] = [];

        let matches: SearchMatch[];
        try {
            matches = await search.find(filePath, parsed.pattern, { fuzzy: parsed.fuzzy ?? true, maxResults });
        } catch (error) {
            if (!(error instanceof SearchError) || !error.recoverable) {
                throw error;
            }
            warnings.push(`${error.message}; returned exact matches only`);
            matches = await search.find(filePath, parsed.pattern, { fuzzy: false, maxResults });
        }

        const session = await sessions.load(filePath);
        const context = await this.collectContext(filePath, session, matches, contextLines);
        const outline = matches.length > 0 ? await this.outlineFor(filePath, session) : [];

        const results = matches.map((match): SearchHit => {
            const shown = truncateLine(match.lineContent, config.truncateLength);
            const enclosing = findEnclosingItem(outline, match.lineNumber);
            const around = context.get(match.lineNumber) ?? { before: [], after: [] };
            return {
                lineNumber: match.lineNumber,
                match: shown.text,
                contextBefore: around.before.map((line) => truncateLine(line, config.truncateLength).text),
                contextAfter: around.after.map((line) => truncateLine(line, config.truncateLength).text),
                semanticContext: enclosing ? `${enclosing.kind} ${enclosing.name}` : "",
                similarityScore: match.score,
                matchKind: match.kind,
                truncated: shown.truncated,
                submatches: match.span ? [match.span] : []
            };
        });
        return warnings.length > 0 ? { results, warnings } : { results };
    }

    public async readContent(args: unknown): Promise<ReadContentResult> {
        const parsed = ReadArgsSchema.parse(args);
        const filePath = resolvePath(parsed.absolute_file_path);
        const mode = parsed.mode ?? "lines";
        const session = await this.services.sessions.load(filePath);

        let targetLine: number;
        let start: number;
        let end: number;
        if (typeof parsed.target === "number") {
            if (parsed.target > session.lineCount) {
                throw new SearchError(
                    "TARGET_NOT_FOUND",
                    `Line ${parsed.target} is past the end of ${filePath} (${session.lineCount} lines)`,
                    { filePath }
                );
            }
            targetLine = parsed.target;
            start = targetLine;
            end = Math.min(targetLine + LINE_WINDOW - 1, session.lineCount);
        } else {
            targetLine = await this.locatePattern(filePath, parsed.target);
            start = Math.max(1, targetLine - PATTERN_WINDOW_RADIUS);
            end = Math.min(targetLine + PATTERN_WINDOW_RADIUS, session.lineCount);
        }
        const targetType = typeof parsed.target === "number" ? "line_number" : "pattern";

        if (mode !== "lines") {
            const outline = await this.outlineFor(filePath, session);
            const enclosing = mode === "function"
                ? findEnclosingItem(outline, targetLine, isCallable)
                : findEnclosingItem(outline, targetLine);
            if (enclosing) {
                return {
                    content: await this.readWindow(filePath, session, enclosing.line, enclosing.endLine),
                    startLine: enclosing.line,
                    endLine: enclosing.endLine,
                    targetType,
                    mode,
                    outlineItem: `${enclosing.kind} ${enclosing.name}`
                };
            }
        }

        return {
            content: await this.readWindow(filePath, session, start, end),
            startLine: start,
            endLine: end,
            targetType,
            mode: "lines"
        };
    }

    public async editContent(args: unknown): Promise<EditContentResult> {
        const parsed = EditArgsSchema.parse(args);
        const { edit, search } = this.services;
        let fuzzy = parsed.fuzzy ?? true;
        const warnings: string[] = [];
        if (fuzzy && !search.hasMatcher) {
            fuzzy = false;
            warnings.push("Fuzzy matching is unavailable; only exact matches were considered");
        }

        const result = await edit.replace(parsed.absolute_file_path, parsed.search_text, parsed.replace_text, {
            fuzzy,
            preview: parsed.preview ?? true,
            maxReplacements: 1
        });
        return warnings.length > 0 ? { ...result, warnings } : result;
    }

    private async locatePattern(filePath: string, pattern: string): Promise<number> {
        const { search } = this.services;
        const [exact] = await search.find(filePath, pattern, { fuzzy: false, maxResults: 1 });
        if (exact) {
            return exact.lineNumber;
        }
        if (search.hasMatcher) {
            const approximate = await search.find(filePath, pattern, { fuzzy: true });
            const best = approximate.reduce<SearchMatch | undefined>(
                (top, match) => (!top || match.score > top.score ? match : top),
                undefined
            );
            if (best) {
                return best.lineNumber;
            }
        }
        throw new SearchError("TARGET_NOT_FOUND", `Pattern '${pattern}' not found in ${filePath}`, { filePath });
    }

    /** Lines `start..end` (1-based, inclusive) joined with their terminators. */
    private async readWindow(filePath: string, session: FileSession, start: number, end: number): Promise<string> {
        const parts: string[] = [];
        let lineNumber = 0;
        for await (const line of this.services.fileAccess.lines(filePath, session.encoding, session.strategy)) {
            lineNumber++;
            if (lineNumber < start) continue;
            if (lineNumber > end) break;
            parts.push(line);
        }
        return parts.join("");
    }

    /**
     * One pass over the file gathering the lines around every match.
     */
    private async collectContext(
        filePath: string,
        session: FileSession,
        matches: SearchMatch[],
        contextLines: number
    ): Promise<Map<number, { before: string[]; after: string[] }>> {
        const context = new Map<number, { before: string[]; after: string[] }>();
        if (matches.length === 0 || contextLines === 0) {
            return context;
        }
        const wanted = new Set(matches.map((match) => match.lineNumber));
        const lastNeeded = Math.max(...wanted) + contextLines;
        const recent: string[] = [];
        const open: Array<{ lineNumber: number; after: string[] }> = [];

        let lineNumber = 0;
        for await (const raw of this.services.fileAccess.lines(filePath, session.encoding, session.strategy)) {
            lineNumber++;
            if (lineNumber > lastNeeded) break;
            const line = stripLineTerminator(raw);

            for (const pending of open) {
                if (pending.lineNumber < lineNumber && pending.after.length < contextLines) {
                    pending.after.push(line);
                }
            }
            if (wanted.has(lineNumber)) {
                const after: string[] = [];
                context.set(lineNumber, { before: [...recent], after });
                open.push({ lineNumber, after });
            }
            recent.push(line);
            if (recent.length > contextLines) recent.shift();
        }
        return context;
    }

    /**
     * Outline for files small enough to read whole; empty when disabled,
     * unsupported, too large, or the provider fails.
     */
    private async outlineFor(filePath: string, session: FileSession): Promise<OutlineItem[]> {
        const { outline, config, fileAccess } = this.services;
        if (!outline || !outline.supports(filePath) || session.fileSize >= config.memoryThreshold) {
            return [];
        }
        try {
            const content = await fileAccess.read(filePath, session.encoding, session.strategy);
            return await outline.outline(filePath, content);
        } catch (error) {
            logger.warn("Outline skipped", { filePath, error: describeError(error) });
            return [];
        }
    }
}
