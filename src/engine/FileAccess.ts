import { IFileSystem } from "../platform/FileSystem.js";
import { AtomicWriter } from "../platform/AtomicWriter.js";
import { AccessStrategy, StrategySelector } from "./StrategySelector.js";
import { createDecoder, createEncoder, decode, encode } from "../encoding/TextCodec.js";
import { AccessError, describeError, toAccessError } from "../errors/LargeFileErrors.js";
import { createLogger } from "../utils/StructuredLogger.js";

export interface FileInfo {
    canonicalPath: string;
    size: number;
    strategy: AccessStrategy;
}

export const DEFAULT_CHUNK_SIZE = 8192;

/**
 * Splits on `\n` only and keeps each terminator with its line, so `\r\n`
 * survives intact. A trailing unterminated fragment is its own line; the
 * empty string has no lines.
 */
export function splitLines(text: string): string[] {
    const lines: string[] = [];
    let start = 0;
    let newline = text.indexOf("\n", start);
    while (newline !== -1) {
        lines.push(text.slice(start, newline + 1));
        start = newline + 1;
        newline = text.indexOf("\n", start);
    }
    if (start < text.length) {
        lines.push(text.slice(start));
    }
    return lines;
}

export function stripLineTerminator(line: string): string {
    return line.replace(/\r?\n$/, "");
}

const logger = createLogger("FileAccess");

/**
 * Reads files with the technique their size calls for and writes them
 * atomically. Every strategy yields identical content and line sequences.
 */
export class FileAccess {
    private readonly writer: AtomicWriter;

    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly selector: StrategySelector,
        private readonly chunkSize: number = DEFAULT_CHUNK_SIZE,
        writer?: AtomicWriter
    ) {
        this.writer = writer ?? new AtomicWriter(fileSystem);
    }

    public get streamingChunkSize(): number {
        return this.chunkSize;
    }

    public async inspect(canonicalPath: string): Promise<FileInfo> {
        let size: number;
        try {
            const stats = await this.fileSystem.stat(canonicalPath);
            if (stats.isDirectory()) {
                throw new AccessError("not-a-file", canonicalPath, `Cannot read ${canonicalPath}: path is a directory`);
            }
            size = stats.size;
        } catch (error) {
            throw toAccessError(error, canonicalPath, "access");
        }
        return { canonicalPath, size, strategy: this.strategyFor(size) };
    }

    public strategyFor(size: number): AccessStrategy {
        return this.selector.select(size);
    }

    /**
     * Whole decoded content. Content past V8's string limit is an AccessError
     * of kind `too-large`; use `lines` or `chunks` for such files.
     */
    public async read(canonicalPath: string, encoding: string, strategy?: AccessStrategy): Promise<string> {
        const chosen = strategy ?? (await this.inspect(canonicalPath)).strategy;
        try {
            switch (chosen) {
                case "memory":
                    return decode(await this.readMemory(canonicalPath), encoding, canonicalPath);
                case "mapped":
                    return decode(await this.readMapped(canonicalPath), encoding, canonicalPath);
                case "streaming": {
                    const parts: string[] = [];
                    for await (const piece of this.chunks(canonicalPath, encoding)) {
                        parts.push(piece);
                    }
                    return parts.join("");
                }
            }
        } catch (error) {
            throw toAccessError(error, canonicalPath, "read");
        }
    }

    public async readLines(canonicalPath: string, encoding: string, strategy?: AccessStrategy): Promise<string[]> {
        const lines: string[] = [];
        for await (const line of this.lines(canonicalPath, encoding, strategy)) {
            lines.push(line);
        }
        return lines;
    }

    /**
     * Line iterator. Streaming files are never held whole: only the pieces of
     * the line straddling chunk boundaries are buffered, and each decoded
     * chunk is scanned once.
     */
    public async *lines(canonicalPath: string, encoding: string, strategy?: AccessStrategy): AsyncGenerator<string> {
        const chosen = strategy ?? (await this.inspect(canonicalPath)).strategy;
        if (chosen !== "streaming") {
            yield* splitLines(await this.read(canonicalPath, encoding, chosen));
            return;
        }

        const partial: string[] = [];
        const flush = (): string => {
            try {
                return partial.length === 1 ? partial[0] : partial.join("");
            } catch (error) {
                throw toAccessError(error, canonicalPath, "read");
            } finally {
                partial.length = 0;
            }
        };
        for await (const piece of this.chunks(canonicalPath, encoding)) {
            let start = 0;
            let newline = piece.indexOf("\n");
            while (newline !== -1) {
                partial.push(piece.slice(start, newline + 1));
                yield flush();
                start = newline + 1;
                newline = piece.indexOf("\n", start);
            }
            if (start < piece.length) {
                partial.push(start === 0 ? piece : piece.slice(start));
            }
        }
        if (partial.length > 0) {
            yield flush();
        }
    }

    /** Decoded text in chunk-sized pieces, with no regard for line breaks. */
    public async *chunks(canonicalPath: string, encoding: string): AsyncGenerator<string> {
        const decoder = createDecoder(encoding, canonicalPath);
        try {
            for await (const chunk of this.fileSystem.readChunks(canonicalPath, this.chunkSize)) {
                const text = decoder.write(chunk);
                if (text.length > 0) {
                    yield text;
                }
            }
        } catch (error) {
            throw toAccessError(error, canonicalPath, "read");
        }
        const tail = decoder.end();
        if (tail.length > 0) {
            yield tail;
        }
    }

    public async write(canonicalPath: string, content: string, encoding: string): Promise<void> {
        await this.writer.write(canonicalPath, encode(content, encoding, canonicalPath));
    }

    /** Atomic write of text produced piece by piece, so the content is never held whole. */
    public async writeStream(canonicalPath: string, pieces: AsyncIterable<string>, encoding: string): Promise<void> {
        const encoder = createEncoder(encoding, canonicalPath);
        async function* encoded(): AsyncGenerator<Buffer> {
            for await (const piece of pieces) {
                const bytes = encoder.write(piece);
                if (bytes.length > 0) {
                    yield bytes;
                }
            }
            const tail = encoder.end();
            if (tail.length > 0) {
                yield tail;
            }
        }
        await this.writer.writeChunks(canonicalPath, encoded());
    }

    private async readMemory(canonicalPath: string): Promise<Buffer> {
        try {
            return await this.fileSystem.readFile(canonicalPath);
        } catch (error) {
            throw toAccessError(error, canonicalPath, "read");
        }
    }

    private async readMapped(canonicalPath: string): Promise<Buffer> {
        try {
            return await this.fileSystem.mapFile(canonicalPath);
        } catch (error) {
            const accessError = toAccessError(error, canonicalPath, "map");
            if (accessError.kind !== "io-failed") {
                throw accessError;
            }
            logger.warn("Mapped read failed, falling back to memory strategy", {
                filePath: canonicalPath,
                error: describeError(error)
            });
            return this.readMemory(canonicalPath);
        }
    }
}
