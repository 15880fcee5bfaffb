import * as path from "path";
import { z } from "zod";
import patternTable from "./patterns.json";
import { splitLines, stripLineTerminator } from "../engine/FileAccess.js";
import { OutlineItem, OutlineKind } from "../types.js";
import { describeError } from "../errors/LargeFileErrors.js";
import { createLogger } from "../utils/StructuredLogger.js";

export interface OutlineRequestOptions {
    /** Epoch milliseconds after which the provider should give up. */
    deadline?: number;
}

/**
 * Structural outline of a file. Optional: callers treat a failure or an
 * empty list the same way.
 */
export interface OutlineProvider {
    readonly name: string;
    supports(filePath: string): boolean;
    outline(filePath: string, content: string, options?: OutlineRequestOptions): Promise<OutlineItem[]>;
}

export class OutlineTimeoutError extends Error {
    constructor(filePath: string) {
        super(`Outline of ${filePath} exceeded its time budget`);
        this.name = "OutlineTimeoutError";
    }
}

const OutlineKindSchema = z.enum([
    "class",
    "function",
    "method",
    "interface",
    "type",
    "struct",
    "enum",
    "trait",
    "impl",
    "heading"
]);

const PatternTableSchema = z.object({
    version: z.number().int(),
    languages: z.array(z.object({
        id: z.string(),
        extensions: z.array(z.string()).min(1),
        block: z.enum(["indent", "braces", "heading"]),
        rules: z.array(z.object({
            kind: OutlineKindSchema,
            pattern: z.string()
        })).min(1)
    }))
});

type BlockStyle = "indent" | "braces" | "heading";

interface CompiledRule {
    kind: OutlineKind;
    regex: RegExp;
}

interface LanguagePatterns {
    id: string;
    block: BlockStyle;
    rules: CompiledRule[];
}

const CONTAINER_KINDS: ReadonlySet<OutlineKind> = new Set(["class", "interface", "struct", "trait", "impl", "enum"]);
const MAX_SIGNATURE_LINES = 8;
const DEADLINE_CHECK_INTERVAL = 512;

const logger = createLogger("OutlineProvider");

function indentWidth(line: string): number {
    const match = /^[ \t]*/.exec(line);
    return match ? match[0].replace(/\t/g, "    ").length : 0;
}

/** Innermost item whose range covers `lineNumber`. */
export function findEnclosingItem(
    items: OutlineItem[],
    lineNumber: number,
    accept: (item: OutlineItem) => boolean = () => true
): OutlineItem | undefined {
    for (const item of items) {
        if (item.line <= lineNumber && lineNumber <= item.endLine) {
            return findEnclosingItem(item.children, lineNumber, accept) ?? (accept(item) ? item : undefined);
        }
    }
    return undefined;
}

/** Depth-first, parents before children. */
export function flattenOutline(items: OutlineItem[]): OutlineItem[] {
    return items.flatMap((item) => [item, ...flattenOutline(item.children)]);
}

/**
 * Regex outline for common source and markup languages. Declarations come
 * from `patterns.json`; block ends come from indentation, brace balance or
 * heading levels depending on the language.
 */
export class PatternOutlineProvider implements OutlineProvider {
    public readonly name = "line-patterns";
    private readonly byExtension = new Map<string, LanguagePatterns>();

    constructor(table: unknown = patternTable) {
        const parsed = PatternTableSchema.parse(table);
        for (const language of parsed.languages) {
            const compiled: LanguagePatterns = {
                id: language.id,
                block: language.block,
                rules: language.rules.map((rule) => ({ kind: rule.kind, regex: new RegExp(rule.pattern) }))
            };
            for (const extension of language.extensions) {
                this.byExtension.set(extension.toLowerCase(), compiled);
            }
        }
    }

    public supports(filePath: string): boolean {
        return this.byExtension.has(path.extname(filePath).toLowerCase());
    }

    public async outline(filePath: string, content: string, options: OutlineRequestOptions = {}): Promise<OutlineItem[]> {
        const language = this.byExtension.get(path.extname(filePath).toLowerCase());
        if (!language) {
            return [];
        }
        const lines = splitLines(content).map(stripLineTerminator);
        const flat: OutlineItem[] = [];
        let inFence = false;

        for (let index = 0; index < lines.length; index++) {
            if (options.deadline !== undefined && index % DEADLINE_CHECK_INTERVAL === 0 && Date.now() > options.deadline) {
                throw new OutlineTimeoutError(filePath);
            }
            const line = lines[index];
            if (language.block === "heading" && /^\s*(```|~~~)/.test(line)) {
                inFence = !inFence;
                continue;
            }
            if (inFence) continue;

            for (const rule of language.rules) {
                const match = rule.regex.exec(line);
                const name = match?.groups?.name?.trim();
                if (!match || !name) continue;

                const level = match.groups?.level?.length ?? 0;
                const end = this.blockEnd(language.block, lines, index, level);
                flat.push({
                    name,
                    kind: rule.kind,
                    line: index + 1,
                    endLine: end + 1,
                    lineCount: end - index + 1,
                    children: []
                });
                break;
            }
        }
        return PatternOutlineProvider.nest(flat);
    }

    private blockEnd(block: BlockStyle, lines: string[], start: number, level: number): number {
        switch (block) {
            case "indent":
                return PatternOutlineProvider.indentEnd(lines, start);
            case "braces":
                return PatternOutlineProvider.braceEnd(lines, start);
            case "heading":
                return PatternOutlineProvider.headingEnd(lines, start, level);
        }
    }

    private static indentEnd(lines: string[], start: number): number {
        const baseIndent = indentWidth(lines[start]);
        let end = start;
        for (let index = start + 1; index < lines.length; index++) {
            const line = lines[index];
            if (line.trim().length === 0) continue;
            if (indentWidth(line) <= baseIndent) break;
            end = index;
        }
        return end;
    }

    private static braceEnd(lines: string[], start: number): number {
        let depth = 0;
        let opened = false;
        for (let index = start; index < lines.length; index++) {
            for (const char of lines[index]) {
                if (char === "{") {
                    depth++;
                    opened = true;
                } else if (char === "}") {
                    depth--;
                }
            }
            if (opened && depth <= 0) {
                return index;
            }
            if (!opened && (lines[index].trimEnd().endsWith(";") || index - start >= MAX_SIGNATURE_LINES)) {
                return start;
            }
        }
        return opened ? lines.length - 1 : start;
    }

    private static headingEnd(lines: string[], start: number, level: number): number {
        let inFence = false;
        for (let index = start + 1; index < lines.length; index++) {
            if (/^\s*(```|~~~)/.test(lines[index])) {
                inFence = !inFence;
                continue;
            }
            if (inFence) continue;
            const heading = /^(#{1,6})\s/.exec(lines[index]);
            if (heading && heading[1].length <= level) {
                return index - 1;
            }
        }
        return lines.length - 1;
    }

    private static nest(flat: OutlineItem[]): OutlineItem[] {
        const roots: OutlineItem[] = [];
        const stack: OutlineItem[] = [];
        for (const item of flat) {
            let parent = stack.at(-1);
            while (parent && (parent.endLine < item.line || item.endLine > parent.endLine)) {
                stack.pop();
                parent = stack.at(-1);
            }
            if (parent) {
                if (item.kind === "function" && CONTAINER_KINDS.has(parent.kind)) {
                    item.kind = "method";
                }
                parent.children.push(item);
            } else {
                roots.push(item);
            }
            stack.push(item);
        }
        return roots;
    }
}

/**
 * Wraps a provider with a wall-clock budget. Timeouts and failures are
 * logged and produce an empty outline.
 */
export class BudgetedOutlineProvider implements OutlineProvider {
    constructor(
        private readonly inner: OutlineProvider,
        private readonly budgetMs: number
    ) {}

    public get name(): string {
        return this.inner.name;
    }

    public supports(filePath: string): boolean {
        return this.inner.supports(filePath);
    }

    public async outline(filePath: string, content: string): Promise<OutlineItem[]> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new OutlineTimeoutError(filePath)), this.budgetMs);
            timer.unref();
        });
        try {
            return await Promise.race([
                this.inner.outline(filePath, content, { deadline: Date.now() + this.budgetMs }),
                timeout
            ]);
        } catch (error) {
            logger.warn("Outline unavailable", {
                filePath,
                provider: this.inner.name,
                budgetMs: this.budgetMs,
                error: describeError(error)
            });
            return [];
        } finally {
            clearTimeout(timer);
        }
    }
}
