export type EditMatchKind = "exact" | "fuzzy" | "none";

export interface EditResult {
    success: boolean;
    /** Unified diff of the affected region, or a no-match notice. */
    preview: string;
    changesMade: number;
    /** 1-based line of the first change; 0 when nothing matched. */
    lineNumber: number;
    similarityUsed: number;
    matchKind: EditMatchKind;
    /** Set only when a non-preview edit was committed. */
    backupCreated?: string;
}

export interface EditOptions {
    fuzzy?: boolean;
    preview?: boolean;
    maxReplacements?: number;
}

export type OutlineKind =
    | "class"
    | "function"
    | "method"
    | "interface"
    | "type"
    | "struct"
    | "enum"
    | "trait"
    | "impl"
    | "heading";

export interface OutlineItem {
    name: string;
    kind: OutlineKind;
    /** 1-based first line. */
    line: number;
    /** 1-based last line, inclusive. */
    endLine: number;
    lineCount: number;
    children: OutlineItem[];
}

export interface FileOverview {
    lineCount: number;
    fileSize: number;
    encoding: string;
    hasLongLines: boolean;
    outline: OutlineItem[];
    searchHints: string[];
}

export interface SearchHit {
    lineNumber: number;
    match: string;
    contextBefore: string[];
    contextAfter: string[];
    /** Innermost outline item enclosing the line, e.g. `function parse`. */
    semanticContext: string;
    similarityScore: number;
    matchKind: "exact" | "fuzzy";
    truncated: boolean;
    submatches: LineRange[];
}

export interface LineRange {
    start: number;
    end: number;
}

export type ReadMode = "lines" | "semantic" | "function";

export interface ReadContentResult {
    content: string;
    startLine: number;
    endLine: number;
    targetType: "line_number" | "pattern";
    mode: ReadMode;
    /** Present when semantic or function mode resolved an enclosing outline item. */
    outlineItem?: string;
}

export interface ToolErrorPayload {
    code: string;
    message: string;
    suggestion: string;
}
