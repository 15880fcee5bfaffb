import { resolvePath } from "../utils/PathResolver.js";

export type FuzzyScorer = "indel" | "levenshtein";

export interface LargeFileConfig {
    memoryThreshold: number;
    mmapThreshold: number;
    maxLineLength: number;
    truncateLength: number;
    fuzzyThreshold: number;
    fuzzyScorer: FuzzyScorer;
    maxSearchResults: number;
    contextLines: number;
    streamingChunkSize: number;
    /** Absolute path; a relative setting is resolved against the working directory. */
    backupDir: string;
    enableOutline: boolean;
    /** Outline time budget in seconds. */
    outlineTimeout: number;
    sessionCacheSize: number;
    editLock: boolean;
}

const MiB = 1024 * 1024;

/** `backupDir` is relative here; {@link resolveConfigFromEnv} makes it absolute. */
export const DEFAULT_CONFIG: Readonly<LargeFileConfig> = Object.freeze({
    memoryThreshold: 50 * MiB,
    mmapThreshold: 500 * MiB,
    maxLineLength: 1000,
    truncateLength: 500,
    fuzzyThreshold: 0.8,
    fuzzyScorer: "indel",
    maxSearchResults: 20,
    contextLines: 2,
    streamingChunkSize: 8192,
    backupDir: ".largefile_backups",
    enableOutline: true,
    outlineTimeout: 5,
    sessionCacheSize: 256,
    editLock: false
});

export function resolveConfigFromEnv(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): LargeFileConfig {
    const memoryThreshold = parsePositiveInt(env.LARGEFILE_MEMORY_THRESHOLD) ?? DEFAULT_CONFIG.memoryThreshold;
    const mmapThreshold = parsePositiveInt(env.LARGEFILE_MMAP_THRESHOLD) ?? DEFAULT_CONFIG.mmapThreshold;

    return {
        memoryThreshold,
        mmapThreshold: Math.max(mmapThreshold, memoryThreshold),
        maxLineLength: parsePositiveInt(env.LARGEFILE_MAX_LINE_LENGTH) ?? DEFAULT_CONFIG.maxLineLength,
        truncateLength: parsePositiveInt(env.LARGEFILE_TRUNCATE_LENGTH) ?? DEFAULT_CONFIG.truncateLength,
        fuzzyThreshold: parseRatio(env.LARGEFILE_FUZZY_THRESHOLD) ?? DEFAULT_CONFIG.fuzzyThreshold,
        fuzzyScorer: normalizeScorer(env.LARGEFILE_FUZZY_SCORER),
        maxSearchResults: parsePositiveInt(env.LARGEFILE_MAX_SEARCH_RESULTS) ?? DEFAULT_CONFIG.maxSearchResults,
        contextLines: parseNonNegativeInt(env.LARGEFILE_CONTEXT_LINES) ?? DEFAULT_CONFIG.contextLines,
        streamingChunkSize: parsePositiveInt(env.LARGEFILE_STREAMING_CHUNK_SIZE) ?? DEFAULT_CONFIG.streamingChunkSize,
        backupDir: resolvePath(nonEmpty(env.LARGEFILE_BACKUP_DIR) ?? DEFAULT_CONFIG.backupDir, cwd),
        enableOutline: parseBoolean(env.LARGEFILE_ENABLE_OUTLINE) ?? DEFAULT_CONFIG.enableOutline,
        outlineTimeout: parsePositiveNumber(env.LARGEFILE_OUTLINE_TIMEOUT) ?? DEFAULT_CONFIG.outlineTimeout,
        sessionCacheSize: parsePositiveInt(env.LARGEFILE_SESSION_CACHE_SIZE) ?? DEFAULT_CONFIG.sessionCacheSize,
        editLock: parseBoolean(env.LARGEFILE_EDIT_LOCK) ?? DEFAULT_CONFIG.editLock
    };
}

function nonEmpty(value: string | undefined): string | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
    const raw = nonEmpty(value);
    if (!raw || !/^\d+$/.test(raw)) return undefined;
    const parsed = Number.parseInt(raw, 10);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
}

function parsePositiveInt(value: string | undefined): number | undefined {
    const parsed = parseNonNegativeInt(value);
    return parsed !== undefined && parsed > 0 ? parsed : undefined;
}

function parsePositiveNumber(value: string | undefined): number | undefined {
    const raw = nonEmpty(value);
    if (!raw) return undefined;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function parseRatio(value: string | undefined): number | undefined {
    const raw = nonEmpty(value);
    if (!raw) return undefined;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
    const raw = nonEmpty(value)?.toLowerCase();
    if (raw === undefined) return undefined;
    if (raw === "true" || raw === "1" || raw === "yes") return true;
    if (raw === "false" || raw === "0" || raw === "no") return false;
    return undefined;
}

function normalizeScorer(value: string | undefined): FuzzyScorer {
    const normalized = nonEmpty(value)?.toLowerCase();
    if (normalized === "levenshtein") return "levenshtein";
    return "indel";
}
