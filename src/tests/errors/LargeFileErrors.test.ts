import { describe, it, expect } from "@jest/globals";
import { AccessError, SearchError, errnoCode, toAccessError } from "../../errors/LargeFileErrors.js";

const errno = (code: string) => Object.assign(new Error(`${code}: failed`), { code });

describe("toAccessError", () => {
    it("maps errno codes onto access kinds", () => {
        expect(toAccessError(errno("ENOENT"), "/a", "read")).toMatchObject({
            kind: "not-found",
            filePath: "/a",
            message: "Cannot read /a: file not found"
        });
        expect(toAccessError(errno("EPERM"), "/a", "read").message).toBe("Cannot read /a: permission denied");
        expect(toAccessError(errno("EISDIR"), "/a", "open").message).toBe("Cannot open /a: path is a directory");
        expect(toAccessError(errno("EMFILE"), "/a", "read")).toMatchObject({
            kind: "io-failed",
            message: "Cannot read /a: EMFILE: failed"
        });
        expect(toAccessError("odd", "/a", "read").message).toBe("Cannot read /a: odd");
    });

    it("names a string or buffer past the engine's size limit", () => {
        const limit = new RangeError("Invalid string length");
        const mapped = toAccessError(limit, "/huge.log", "read");
        expect(mapped).toMatchObject({
            kind: "too-large",
            filePath: "/huge.log",
            message: "Cannot read /huge.log: content is too large to hold in memory (Invalid string length)"
        });
        expect(mapped.cause).toBe(limit);
    });

    it("keeps the original error as the cause", () => {
        const original = errno("EACCES");
        expect(toAccessError(original, "/a", "read").cause).toBe(original);
    });

    it("passes access errors through", () => {
        const existing = new AccessError("decode-failed", "/a", "bad bytes");
        expect(toAccessError(existing, "/b", "read")).toBe(existing);
    });
});

describe("error helpers", () => {
    it("reads errno codes only when they are strings", () => {
        expect(errnoCode(errno("ENOENT"))).toBe("ENOENT");
        expect(errnoCode({ code: 2 })).toBeUndefined();
        expect(errnoCode(null)).toBeUndefined();
    });

    it("marks only a missing matcher as recoverable", () => {
        expect(new SearchError("MATCHER_UNAVAILABLE", "x").recoverable).toBe(true);
        expect(new SearchError("READ_FAILED", "x").recoverable).toBe(false);
    });
});
