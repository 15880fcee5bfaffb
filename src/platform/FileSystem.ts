import * as path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { createReadStream, createWriteStream, promises as fsPromises, constants as fsConstants } from "fs";

export interface FileStats {
    size: number;
    isDirectory(): boolean;
    isFile(): boolean;
}

export interface WriteChunksOptions {
    /** Fail with `EEXIST` instead of replacing an existing file. */
    exclusive?: boolean;
}

/**
 * Byte level filesystem seam. Every call opens, works and closes within its own
 * scope; no handle outlives a call.
 */
export interface IFileSystem {
    readFile(path: string): Promise<Buffer>;
    /** Reads the whole byte region of the file through one positioned read into a buffer sized to the file. */
    mapFile(path: string): Promise<Buffer>;
    /** Reads the first `length` bytes (fewer for a shorter file). */
    readHead(path: string, length: number): Promise<Buffer>;
    readChunks(path: string, chunkSize: number): AsyncIterable<Buffer>;
    writeFile(path: string, data: Buffer): Promise<void>;
    /** Writes the chunks in order as they arrive; the file is created before the first chunk is pulled. */
    writeChunks(path: string, chunks: AsyncIterable<Buffer>, options?: WriteChunksOptions): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    deleteFile(path: string): Promise<void>;
    exists(path: string): Promise<boolean>;
    createDir(path: string): Promise<void>;
    stat(path: string): Promise<FileStats>;
}

export class NodeFileSystem implements IFileSystem {
    private readonly rootPath: string;

    constructor(rootPath: string = process.cwd()) {
        this.rootPath = path.resolve(rootPath);
    }

    private resolvePath(targetPath: string): string {
        if (!targetPath) {
            return this.rootPath;
        }
        return path.isAbsolute(targetPath)
            ? path.normalize(targetPath)
            : path.join(this.rootPath, targetPath);
    }

    async readFile(targetPath: string): Promise<Buffer> {
        return fsPromises.readFile(this.resolvePath(targetPath));
    }

    async mapFile(targetPath: string): Promise<Buffer> {
        const handle = await fsPromises.open(this.resolvePath(targetPath), "r");
        try {
            const { size } = await handle.stat();
            const region = Buffer.allocUnsafe(size);
            let offset = 0;
            while (offset < size) {
                const { bytesRead } = await handle.read(region, offset, size - offset, offset);
                if (bytesRead === 0) {
                    break;
                }
                offset += bytesRead;
            }
            return offset === size ? region : region.subarray(0, offset);
        } finally {
            await handle.close();
        }
    }

    async readHead(targetPath: string, length: number): Promise<Buffer> {
        const handle = await fsPromises.open(this.resolvePath(targetPath), "r");
        try {
            const head = Buffer.alloc(length);
            const { bytesRead } = await handle.read(head, 0, length, 0);
            return head.subarray(0, bytesRead);
        } finally {
            await handle.close();
        }
    }

    async *readChunks(targetPath: string, chunkSize: number): AsyncIterable<Buffer> {
        const stream = createReadStream(this.resolvePath(targetPath), { highWaterMark: chunkSize });
        for await (const chunk of stream) {
            yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        }
    }

    async writeFile(targetPath: string, data: Buffer): Promise<void> {
        await fsPromises.writeFile(this.resolvePath(targetPath), data);
    }

    async writeChunks(targetPath: string, chunks: AsyncIterable<Buffer>, options: WriteChunksOptions = {}): Promise<void> {
        const output = createWriteStream(this.resolvePath(targetPath), { flags: options.exclusive ? "wx" : "w" });
        await pipeline(Readable.from(chunks), output);
    }

    async rename(from: string, to: string): Promise<void> {
        await fsPromises.rename(this.resolvePath(from), this.resolvePath(to));
    }

    async deleteFile(targetPath: string): Promise<void> {
        await fsPromises.unlink(this.resolvePath(targetPath));
    }

    async exists(targetPath: string): Promise<boolean> {
        try {
            await fsPromises.access(this.resolvePath(targetPath), fsConstants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async createDir(targetPath: string): Promise<void> {
        await fsPromises.mkdir(this.resolvePath(targetPath), { recursive: true });
    }

    async stat(targetPath: string): Promise<FileStats> {
        const stats = await fsPromises.stat(this.resolvePath(targetPath));
        return {
            size: stats.size,
            isDirectory: () => stats.isDirectory(),
            isFile: () => stats.isFile(),
        };
    }
}

interface MemoryFileEntry {
    content: Buffer;
}

function fsError(code: string, message: string): Error & { code: string } {
    return Object.assign(new Error(`${code}: ${message}`), { code });
}

/**
 * In-process filesystem for tests and fault injection. Subclasses override
 * single operations to simulate failures.
 */
export class MemoryFileSystem implements IFileSystem {
    private readonly rootPath: string;
    private readonly files = new Map<string, MemoryFileEntry>();
    private readonly directories = new Set<string>();

    constructor(rootPath: string = process.cwd()) {
        this.rootPath = path.resolve(rootPath);
        this.directories.add(this.rootPath);
    }

    private resolvePath(targetPath: string): string {
        if (!targetPath) {
            return this.rootPath;
        }
        return path.isAbsolute(targetPath)
            ? path.normalize(targetPath)
            : path.join(this.rootPath, targetPath);
    }

    private ensureParentDirectories(targetPath: string): void {
        let current = path.dirname(targetPath);
        while (!this.directories.has(current)) {
            this.directories.add(current);
            const next = path.dirname(current);
            if (next === current) {
                break;
            }
            current = next;
        }
    }

    private entry(targetPath: string, action: string): MemoryFileEntry {
        const resolved = this.resolvePath(targetPath);
        const entry = this.files.get(resolved);
        if (!entry) {
            if (this.directories.has(resolved)) {
                throw fsError("EISDIR", `illegal operation on a directory, ${action} '${resolved}'`);
            }
            throw fsError("ENOENT", `no such file or directory, ${action} '${resolved}'`);
        }
        return entry;
    }

    async readFile(targetPath: string): Promise<Buffer> {
        return Buffer.from(this.entry(targetPath, "open").content);
    }

    async mapFile(targetPath: string): Promise<Buffer> {
        return this.readFile(targetPath);
    }

    async readHead(targetPath: string, length: number): Promise<Buffer> {
        return Buffer.from(this.entry(targetPath, "open").content.subarray(0, length));
    }

    async *readChunks(targetPath: string, chunkSize: number): AsyncIterable<Buffer> {
        const content = this.entry(targetPath, "open").content;
        for (let offset = 0; offset < content.length; offset += chunkSize) {
            yield Buffer.from(content.subarray(offset, offset + chunkSize));
        }
    }

    async writeFile(targetPath: string, data: Buffer): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        this.ensureParentDirectories(resolved);
        this.files.set(resolved, { content: Buffer.from(data) });
    }

    async writeChunks(targetPath: string, chunks: AsyncIterable<Buffer>, options: WriteChunksOptions = {}): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        if (options.exclusive && this.files.has(resolved)) {
            throw fsError("EEXIST", `file already exists, open '${resolved}'`);
        }
        this.ensureParentDirectories(resolved);
        // created up front, as open(2) would, so a racing exclusive write sees it
        const entry: MemoryFileEntry = { content: Buffer.alloc(0) };
        this.files.set(resolved, entry);
        const parts: Buffer[] = [];
        for await (const chunk of chunks) {
            parts.push(chunk);
        }
        entry.content = Buffer.concat(parts);
    }

    async rename(from: string, to: string): Promise<void> {
        const fromResolved = this.resolvePath(from);
        const entry = this.files.get(fromResolved);
        if (!entry) {
            throw fsError("ENOENT", `no such file or directory, rename '${fromResolved}'`);
        }
        this.files.delete(fromResolved);
        this.files.set(this.resolvePath(to), entry);
    }

    async deleteFile(targetPath: string): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        if (!this.files.delete(resolved)) {
            throw fsError("ENOENT", `no such file or directory, unlink '${resolved}'`);
        }
    }

    async exists(targetPath: string): Promise<boolean> {
        const resolved = this.resolvePath(targetPath);
        return this.files.has(resolved) || this.directories.has(resolved);
    }

    async createDir(targetPath: string): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        this.ensureParentDirectories(resolved);
        this.directories.add(resolved);
    }

    async stat(targetPath: string): Promise<FileStats> {
        const resolved = this.resolvePath(targetPath);
        const file = this.files.get(resolved);
        if (file) {
            return {
                size: file.content.length,
                isDirectory: () => false,
                isFile: () => true,
            };
        }
        if (this.directories.has(resolved)) {
            return {
                size: 0,
                isDirectory: () => true,
                isFile: () => false,
            };
        }
        throw fsError("ENOENT", `no such file or directory, stat '${resolved}'`);
    }

    /** Paths of every stored file, sorted. */
    listFiles(): string[] {
        return [...this.files.keys()].sort();
    }
}
