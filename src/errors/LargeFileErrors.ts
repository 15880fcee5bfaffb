export type AccessErrorKind =
    | "not-found"
    | "permission-denied"
    | "decode-failed"
    | "not-a-file"
    | "write-failed"
    | "invalid-path"
    | "too-large"
    | "io-failed";

export type SearchErrorCode = "READ_FAILED" | "MATCHER_UNAVAILABLE" | "INVALID_PATTERN" | "TARGET_NOT_FOUND";

export type EditErrorCode =
    | "INVALID_PARAMS"
    | "READ_FAILED"
    | "MATCHER_UNAVAILABLE"
    | "BACKUP_FAILED"
    | "WRITE_FAILED";

/**
 * Raised for every failure to open, read, decode or write a file.
 */
export class AccessError extends Error {
    public readonly kind: AccessErrorKind;
    public readonly filePath: string;

    constructor(kind: AccessErrorKind, filePath: string, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = "AccessError";
        this.kind = kind;
        this.filePath = filePath;
    }
}

export class SearchError extends Error {
    public readonly code: SearchErrorCode;
    public readonly filePath?: string;

    constructor(code: SearchErrorCode, message: string, options: { filePath?: string; cause?: unknown } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "SearchError";
        this.code = code;
        this.filePath = options.filePath;
    }

    /** The caller can retry the same search without fuzzy matching. */
    get recoverable(): boolean {
        return this.code === "MATCHER_UNAVAILABLE";
    }
}

export class EditError extends Error {
    public readonly code: EditErrorCode;
    public readonly filePath?: string;

    constructor(code: EditErrorCode, message: string, options: { filePath?: string; cause?: unknown } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "EditError";
        this.code = code;
        this.filePath = options.filePath;
    }
}

export function errnoCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error) {
        return typeof error.code === "string" ? error.code : undefined;
    }
    return undefined;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a Node.js filesystem failure onto the access taxonomy. A RangeError is
 * V8 refusing to build a string or buffer that large.
 */
export function toAccessError(error: unknown, filePath: string, action: string): AccessError {
    if (error instanceof AccessError) {
        return error;
    }
    if (error instanceof RangeError) {
        return new AccessError(
            "too-large",
            filePath,
            `Cannot ${action} ${filePath}: content is too large to hold in memory (${error.message})`,
            error
        );
    }
    const code = errnoCode(error);
    const detail = describeError(error);
    switch (code) {
        case "ENOENT":
        case "ENOTDIR":
            return new AccessError("not-found", filePath, `Cannot ${action} ${filePath}: file not found`, error);
        case "EACCES":
        case "EPERM":
            return new AccessError("permission-denied", filePath, `Cannot ${action} ${filePath}: permission denied`, error);
        case "EISDIR":
            return new AccessError("not-a-file", filePath, `Cannot ${action} ${filePath}: path is a directory`, error);
        default:
            return new AccessError("io-failed", filePath, `Cannot ${action} ${filePath}: ${detail}`, error);
    }
}
