import * as crypto from "crypto";
import { LRUCache } from "lru-cache";
import { IFileSystem } from "../platform/FileSystem.js";
import { FileAccess } from "./FileAccess.js";
import { EncodingResolver } from "../encoding/EncodingResolver.js";
import { createDecoder } from "../encoding/TextCodec.js";
import { AccessStrategy } from "./StrategySelector.js";
import { resolvePath } from "../utils/PathResolver.js";
import { toAccessError } from "../errors/LargeFileErrors.js";
import { createLogger } from "../utils/StructuredLogger.js";

/**
 * Metadata snapshot of a file, valid only while the live file still hashes to
 * `contentHash`. Sessions are frozen; a content change produces a new one.
 */
export interface FileSession {
    readonly canonicalPath: string;
    /** SHA-256 of the full byte content, hex. */
    readonly contentHash: string;
    readonly lineCount: number;
    readonly fileSize: number;
    readonly encoding: string;
    readonly chunkSize: number;
    readonly strategy: AccessStrategy;
    readonly createdAt: number;
    readonly hasLongLines: boolean;
    /** Length in characters of the longest line, terminator excluded. */
    readonly longestLine: number;
}

export interface SessionCacheOptions {
    maxLineLength: number;
    maxSessions?: number;
}

const KEY_SEPARATOR = "\u0000";
const CARRIAGE_RETURN = 13;
const logger = createLogger("SessionCache");

interface ContentScan {
    contentHash: string;
    fileSize: number;
    lineCount: number;
    longestLine: number;
}

/**
 * Line count and longest line over decoded text fed in arbitrary pieces.
 * Lengths exclude the terminator (`\n` or `\r\n`).
 */
class LineTally {
    public lineCount = 0;
    public longestLine = 0;
    private current = 0;
    private endsWithCarriageReturn = false;

    public push(text: string): void {
        let start = 0;
        let newline = text.indexOf("\n");
        while (newline !== -1) {
            const crBefore = newline > 0
                ? text.charCodeAt(newline - 1) === CARRIAGE_RETURN
                : this.endsWithCarriageReturn;
            this.close(this.current + newline - start - (crBefore ? 1 : 0));
            start = newline + 1;
            newline = text.indexOf("\n", start);
        }
        this.current += text.length - start;
        if (text.length > 0) {
            this.endsWithCarriageReturn = text.charCodeAt(text.length - 1) === CARRIAGE_RETURN;
        }
    }

    public finish(): void {
        if (this.current > 0) {
            this.close(this.current);
        }
    }

    private close(length: number): void {
        this.lineCount++;
        if (length > this.longestLine) {
            this.longestLine = length;
        }
        this.current = 0;
    }
}

export class SessionCache {
    private readonly sessions: LRUCache<string, FileSession>;
    private readonly inflight = new Map<string, Promise<FileSession>>();
    private readonly maxLineLength: number;

    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly fileAccess: FileAccess,
        private readonly encodingResolver: EncodingResolver,
        options: SessionCacheOptions
    ) {
        this.maxLineLength = options.maxLineLength;
        this.sessions = new LRUCache<string, FileSession>({ max: options.maxSessions ?? 256 });
    }

    public get size(): number {
        return this.sessions.size;
    }

    /**
     * Reads the file once (O(size)), hashing the bytes and counting lines in
     * the same pass, and returns the session for that content. Concurrent
     * loads of one path share the pass.
     */
    public async load(filePath: string): Promise<FileSession> {
        const canonicalPath = resolvePath(filePath);
        const pending = this.inflight.get(canonicalPath);
        if (pending) {
            return pending;
        }

        const build: Promise<FileSession> = this.buildSession(canonicalPath).finally(() => {
            if (this.inflight.get(canonicalPath) === build) {
                this.inflight.delete(canonicalPath);
            }
        });
        this.inflight.set(canonicalPath, build);
        return build;
    }

    /** Same hashing cost as `load`, but never builds a session. */
    public async get(filePath: string): Promise<FileSession | undefined> {
        const canonicalPath = resolvePath(filePath);
        const contentHash = await this.hashFile(canonicalPath);
        return this.sessions.get(SessionCache.keyFor(canonicalPath, contentHash));
    }

    /** Drops every session of the path; a load already under way is not joined by later ones. */
    public invalidate(filePath: string): number {
        const canonicalPath = resolvePath(filePath);
        this.inflight.delete(canonicalPath);
        return this.dropSessions(canonicalPath);
    }

    private dropSessions(canonicalPath: string): number {
        const prefix = canonicalPath + KEY_SEPARATOR;
        let removed = 0;
        for (const key of [...this.sessions.keys()]) {
            if (key.startsWith(prefix)) {
                this.sessions.delete(key);
                removed++;
            }
        }
        if (removed > 0) {
            logger.debug("Invalidated sessions", { filePath: canonicalPath, removed });
        }
        return removed;
    }

    public async hashFile(canonicalPath: string): Promise<string> {
        const hash = crypto.createHash("sha256");
        try {
            for await (const chunk of this.fileSystem.readChunks(canonicalPath, this.fileAccess.streamingChunkSize)) {
                hash.update(chunk);
            }
        } catch (error) {
            throw toAccessError(error, canonicalPath, "hash");
        }
        return hash.digest("hex");
    }

    private store(key: string, session: FileSession): void {
        // a new hash supersedes whatever was cached for the same path
        this.dropSessions(session.canonicalPath);
        this.sessions.set(key, session);
    }

    private async buildSession(canonicalPath: string): Promise<FileSession> {
        await this.fileAccess.inspect(canonicalPath);
        const encoding = await this.encodingResolver.resolve(canonicalPath);
        const scan = await this.scanContent(canonicalPath, encoding);
        const key = SessionCache.keyFor(canonicalPath, scan.contentHash);
        const cached = this.sessions.get(key);
        if (cached) {
            return cached;
        }

        const strategy = this.fileAccess.strategyFor(scan.fileSize);
        const session: FileSession = Object.freeze({
            canonicalPath,
            contentHash: scan.contentHash,
            lineCount: scan.lineCount,
            fileSize: scan.fileSize,
            encoding,
            chunkSize: this.fileAccess.streamingChunkSize,
            strategy,
            createdAt: Date.now(),
            hasLongLines: scan.longestLine > this.maxLineLength,
            longestLine: scan.longestLine
        });
        this.store(key, session);
        logger.debug("Session built", { filePath: canonicalPath, lineCount: scan.lineCount, strategy, encoding });
        return session;
    }

    /** Hash, size and line metrics from the same bytes, so they always describe one content. */
    private async scanContent(canonicalPath: string, encoding: string): Promise<ContentScan> {
        const hash = crypto.createHash("sha256");
        const decoder = createDecoder(encoding, canonicalPath);
        const tally = new LineTally();
        let fileSize = 0;
        try {
            for await (const chunk of this.fileSystem.readChunks(canonicalPath, this.fileAccess.streamingChunkSize)) {
                hash.update(chunk);
                fileSize += chunk.length;
                tally.push(decoder.write(chunk));
            }
            tally.push(decoder.end());
        } catch (error) {
            throw toAccessError(error, canonicalPath, "read");
        }
        tally.finish();
        return {
            contentHash: hash.digest("hex"),
            fileSize,
            lineCount: tally.lineCount,
            longestLine: tally.longestLine
        };
    }

    private static keyFor(canonicalPath: string, contentHash: string): string {
        return `${canonicalPath}${KEY_SEPARATOR}${contentHash}`;
    }
}
