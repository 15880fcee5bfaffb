import * as path from "path";
import * as crypto from "crypto";
import { IFileSystem } from "./FileSystem.js";
import { AccessError, describeError, errnoCode } from "../errors/LargeFileErrors.js";
import { createLogger } from "../utils/StructuredLogger.js";

/**
 * `rename` relies on rename(2) replacing the target in one step.
 * `remove-then-rename` deletes an existing target first, for platforms whose
 * rename refuses to overwrite. The target is briefly absent in that mode.
 */
export type ReplaceMode = "rename" | "remove-then-rename";

export function defaultReplaceMode(platform: NodeJS.Platform = process.platform): ReplaceMode {
    return platform === "win32" ? "remove-then-rename" : "rename";
}

const logger = createLogger("AtomicWriter");

export class AtomicWriter {
    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly replaceMode: ReplaceMode = defaultReplaceMode()
    ) {}

    /**
     * On success the target holds exactly `data`. On failure the target is
     * unchanged (modulo the remove-then-rename window), the temp file is gone,
     * and an AccessError is thrown.
     */
    public async write(targetPath: string, data: Buffer): Promise<void> {
        await this.commit(targetPath, (tempPath) => this.fileSystem.writeFile(tempPath, data));
    }

    /** Same guarantees as `write`, for content produced piece by piece. */
    public async writeChunks(targetPath: string, chunks: AsyncIterable<Buffer>): Promise<void> {
        await this.commit(targetPath, (tempPath) => this.fileSystem.writeChunks(tempPath, chunks));
    }

    private async commit(targetPath: string, fill: (tempPath: string) => Promise<void>): Promise<void> {
        const tempPath = this.tempPathFor(targetPath);
        try {
            await fill(tempPath);
            if (this.replaceMode === "remove-then-rename" && await this.fileSystem.exists(targetPath)) {
                await this.fileSystem.deleteFile(targetPath);
            }
            await this.fileSystem.rename(tempPath, targetPath);
        } catch (error) {
            await this.discardTemp(tempPath);
            throw new AccessError(
                "write-failed",
                targetPath,
                `Failed to write ${targetPath}: ${describeError(error)}`,
                error
            );
        }
    }

    private tempPathFor(targetPath: string): string {
        const suffix = crypto.randomBytes(6).toString("hex");
        return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.${process.pid}.${suffix}.tmp`);
    }

    private async discardTemp(tempPath: string): Promise<void> {
        try {
            await this.fileSystem.deleteFile(tempPath);
        } catch (error) {
            if (errnoCode(error) !== "ENOENT") {
                logger.warn("Failed to remove temporary file", { tempPath, error: describeError(error) });
            }
        }
    }
}
