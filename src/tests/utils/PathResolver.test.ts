import { describe, it, expect } from "@jest/globals";
import * as path from "path";
import { resolvePath } from "../../utils/PathResolver.js";

const cwd = path.resolve("/work/project");
const home = path.resolve("/home/tester");

describe("resolvePath", () => {
    it("resolves relative paths against the working directory", () => {
        expect(resolvePath("src/../data.txt", cwd, home)).toBe(path.join(cwd, "data.txt"));
    });

    it("normalizes absolute paths", () => {
        const absolute = path.resolve("/tmp/a/./b/../c.txt");
        expect(resolvePath(absolute, cwd, home)).toBe(path.resolve("/tmp/a/c.txt"));
    });

    it("expands the home directory", () => {
        expect(resolvePath("~", cwd, home)).toBe(home);
        expect(resolvePath("~/notes.md", cwd, home)).toBe(path.join(home, "notes.md"));
    });

    it("leaves other tildes alone", () => {
        expect(resolvePath("~other/x", cwd, home)).toBe(path.join(cwd, "~other", "x"));
    });

    it("rejects empty input", () => {
        expect(() => resolvePath("  ", cwd, home)).toThrow(
            expect.objectContaining({ name: "AccessError", kind: "invalid-path", message: "A file path is required" })
        );
    });
});
