import * as os from "os";
import * as path from "path";
import { AccessError } from "../errors/LargeFileErrors.js";

/**
 * Canonical form of a user supplied path: `~` expanded, absolute, normalized.
 * Never touches the filesystem, so a missing target resolves fine.
 */
export function resolvePath(inputPath: string, cwd: string = process.cwd(), homeDir: string = os.homedir()): string {
    if (typeof inputPath !== "string" || inputPath.trim().length === 0) {
        throw new AccessError("invalid-path", String(inputPath), "A file path is required");
    }

    let expanded = inputPath;
    if (expanded === "~") {
        expanded = homeDir;
    } else if (expanded.startsWith("~/") || expanded.startsWith("~\\")) {
        expanded = path.join(homeDir, expanded.slice(2));
    }

    return path.normalize(path.resolve(cwd, expanded));
}
