import * as path from "path";
import { IFileSystem } from "../platform/FileSystem.js";
import { DEFAULT_CHUNK_SIZE } from "./FileAccess.js";
import { EditError, describeError, errnoCode, toAccessError } from "../errors/LargeFileErrors.js";
import { resolvePath } from "../utils/PathResolver.js";
import { createLogger } from "../utils/StructuredLogger.js";

const logger = createLogger("BackupStore");
const MAX_NAME_ATTEMPTS = 1000;

function pad(value: number, width = 2): string {
    return String(value).padStart(width, "0");
}

/** `YYYYMMDD_HHMMSS_mmm` in UTC. */
export function formatBackupTimestamp(date: Date): string {
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
        + `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
        + `_${pad(date.getUTCMilliseconds(), 3)}`;
}

export interface BackupStoreOptions {
    clock?: () => Date;
    chunkSize?: number;
}

/**
 * Writes byte-exact pre-edit copies as `<name>.<timestamp>.backup`, adding a
 * counter when that name is already taken. Each name is created exclusively,
 * so concurrent backups in the same millisecond never share a file.
 */
export class BackupStore {
    private readonly backupDir: string;
    private readonly clock: () => Date;
    private readonly chunkSize: number;

    constructor(
        private readonly fileSystem: IFileSystem,
        backupDir: string,
        options: BackupStoreOptions = {}
    ) {
        this.backupDir = resolvePath(backupDir);
        this.clock = options.clock ?? (() => new Date());
        this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    }

    public get directory(): string {
        return this.backupDir;
    }

    public async backup(filePath: string): Promise<string> {
        const sourcePath = resolvePath(filePath);
        try {
            await this.fileSystem.createDir(this.backupDir);
            const info = await this.fileSystem.stat(sourcePath).catch((error: unknown) => {
                throw toAccessError(error, sourcePath, "back up");
            });
            const backupPath = await this.copyToFreeName(sourcePath);
            logger.info("Backup created", { filePath: sourcePath, backupPath, bytes: info.size });
            return backupPath;
        } catch (error) {
            throw new EditError(
                "BACKUP_FAILED",
                `Failed to create backup of ${sourcePath} in ${this.backupDir}: ${describeError(error)}`,
                { filePath: sourcePath, cause: error }
            );
        }
    }

    private async copyToFreeName(sourcePath: string): Promise<string> {
        const stem = `${path.basename(sourcePath)}.${formatBackupTimestamp(this.clock())}`;
        for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
            const candidate = path.join(this.backupDir, attempt === 0 ? `${stem}.backup` : `${stem}.${attempt}.backup`);
            try {
                await this.fileSystem.writeChunks(
                    candidate,
                    this.fileSystem.readChunks(sourcePath, this.chunkSize),
                    { exclusive: true }
                );
                return candidate;
            } catch (error) {
                if (errnoCode(error) === "EEXIST") {
                    continue;
                }
                await this.discardPartial(candidate);
                throw toAccessError(error, sourcePath, "back up");
            }
        }
        throw new Error(`No free backup name for ${stem}`);
    }

    private async discardPartial(candidate: string): Promise<void> {
        try {
            await this.fileSystem.deleteFile(candidate);
        } catch (error) {
            if (errnoCode(error) !== "ENOENT") {
                logger.warn("Failed to remove partial backup", { backupPath: candidate, error: describeError(error) });
            }
        }
    }
}
