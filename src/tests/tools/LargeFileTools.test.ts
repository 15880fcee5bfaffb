import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_CONFIG, LargeFileConfig } from "../../config/LargeFileConfig.js";
import {
    LargeFileTools,
    ServiceOverrides,
    ToolResponse,
    createServices,
    searchHintsFor,
    truncateLine
} from "../../tools/LargeFileTools.js";
import { TOOL_DEFINITIONS, TOOL_NAMES, isToolName } from "../../tools/ToolSchemas.js";

const LINES = [
    "import os",
    "",
    "class Greeter:",
    "    def __init__(self, name):",
    "        self.name = name",
    "",
    "    def greet(self):",
    "        return f\"Hello {self.name}\"",
    "",
    "def main():",
    "    print(Greeter(\"x\").greet())",
    ...Array.from({ length: 19 }, (_, index) => `value_${index + 12} = ${index + 12}`)
];
const CONTENT = LINES.map((line) => `${line}\n`).join("");

/** Lines `start..end`, 1-based and inclusive, with their terminators. */
const linesBetween = (start: number, end: number) => LINES.slice(start - 1, end).map((line) => `${line}\n`).join("");

const NOT_FOUND_SUGGESTION = "Check that the path is correct and absolute, and that the file still exists.";

function parseResponse(response: ToolResponse): unknown {
    return JSON.parse(response.content[0].text);
}

describe("LargeFileTools", () => {
    let tempDir: string;
    let filePath: string;
    let config: LargeFileConfig;

    const createTools = (overrides: ServiceOverrides = {}) => new LargeFileTools(createServices(config, overrides));

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "largefile-tools-"));
        filePath = path.join(tempDir, "greeter.py");
        fs.writeFileSync(filePath, CONTENT);
        config = { ...DEFAULT_CONFIG, backupDir: path.join(tempDir, ".backups") };
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    describe("get_overview", () => {
        it("summarizes the file with its outline", async () => {
            const overview = await createTools().getOverview({ absolute_file_path: filePath });

            expect(overview).toEqual({
                lineCount: 30,
                fileSize: Buffer.byteLength(CONTENT),
                encoding: "utf-8",
                hasLongLines: false,
                outline: [
                    {
                        name: "Greeter",
                        kind: "class",
                        line: 3,
                        endLine: 8,
                        lineCount: 6,
                        children: [
                            { name: "__init__", kind: "method", line: 4, endLine: 5, lineCount: 2, children: [] },
                            { name: "greet", kind: "method", line: 7, endLine: 8, lineCount: 2, children: [] }
                        ]
                    },
                    { name: "main", kind: "function", line: 10, endLine: 11, lineCount: 2, children: [] }
                ],
                searchHints: ["Greeter", "__init__", "greet", "main", "def ", "class ", "import ", "TODO"]
            });
        });

        it("omits the outline when it is disabled", async () => {
            const overview = await createTools({ outline: null }).getOverview({ absolute_file_path: filePath });
            expect(overview.outline).toEqual([]);
            expect(overview.searchHints).toEqual(["def ", "class ", "import ", "TODO"]);
        });

        it("flags lines longer than the limit", async () => {
            const wide = path.join(tempDir, "wide.log");
            fs.writeFileSync(wide, "ok\n" + "w".repeat(1001) + "\n");
            const overview = await createTools().getOverview({ absolute_file_path: wide });
            expect(overview).toMatchObject({ lineCount: 2, hasLongLines: true, outline: [] });
        });
    });

    describe("search_content", () => {
        it("returns matches with context and enclosing items", async () => {
            const result = await createTools().searchContent({
                absolute_file_path: filePath,
                pattern: "self.name",
                context_lines: 1,
                fuzzy: false
            });

            expect(result).toEqual({
                results: [
                    {
                        lineNumber: 5,
                        match: "        self.name = name",
                        contextBefore: ["    def __init__(self, name):"],
                        contextAfter: [""],
                        semanticContext: "method __init__",
                        similarityScore: 1,
                        matchKind: "exact",
                        truncated: false,
                        submatches: [{ start: 8, end: 17 }]
                    },
                    {
                        lineNumber: 8,
                        match: "        return f\"Hello {self.name}\"",
                        contextBefore: ["    def greet(self):"],
                        contextAfter: [""],
                        semanticContext: "method greet",
                        similarityScore: 1,
                        matchKind: "exact",
                        truncated: false,
                        submatches: [{ start: 24, end: 33 }]
                    }
                ]
            });
        });

        it("honours the result limit and default context", async () => {
            const { results } = await createTools().searchContent({ absolute_file_path: filePath, pattern: "value_2", max_results: 2 });

            expect(results.map((hit) => hit.lineNumber)).toEqual([20, 21]);
            expect(results[0].contextBefore).toEqual(["value_18 = 18", "value_19 = 19"]);
            expect(results[0].contextAfter).toEqual(["value_21 = 21", "value_22 = 22"]);
            expect(results[0].semanticContext).toBe("");
        });

        it("truncates long lines", async () => {
            const wide = path.join(tempDir, "wide.txt");
            fs.writeFileSync(wide, "a".repeat(600) + "needle\nshort\n");

            const { results } = await createTools().searchContent({ absolute_file_path: wide, pattern: "needle", fuzzy: false });

            expect(results).toHaveLength(1);
            expect(results[0].match).toBe("a".repeat(500) + "...[truncated]");
            expect(results[0].truncated).toBe(true);
            expect(results[0].submatches).toEqual([{ start: 600, end: 606 }]);
            expect(results[0].contextAfter).toEqual(["short"]);
        });

        it("falls back to exact matching without a matcher", async () => {
            const result = await createTools({ matcher: null }).searchContent({ absolute_file_path: filePath, pattern: "def main" });

            expect(result.results.map((hit) => hit.lineNumber)).toEqual([10]);
            expect(result.warnings).toEqual([
                "Fuzzy matching is unavailable: no similarity matcher is configured; returned exact matches only"
            ]);
        });

        it("returns an empty result list when nothing matches", async () => {
            expect(await createTools().searchContent({ absolute_file_path: filePath, pattern: "zzzzqqqq" })).toEqual({ results: [] });
        });
    });

    describe("read_content", () => {
        it("reads twenty lines from a line number", async () => {
            expect(await createTools().readContent({ absolute_file_path: filePath, target: 5 })).toEqual({
                content: linesBetween(5, 24),
                startLine: 5,
                endLine: 24,
                targetType: "line_number",
                mode: "lines"
            });
        });

        it("stops at the end of the file", async () => {
            const result = await createTools().readContent({ absolute_file_path: filePath, target: 30 });
            expect(result).toMatchObject({ content: "value_30 = 30\n", startLine: 30, endLine: 30 });
        });

        it("rejects a line past the end", async () => {
            const response = await createTools().call("read_content", { absolute_file_path: filePath, target: 31 });

            expect(response.isError).toBe(true);
            expect(parseResponse(response)).toEqual({
                error: {
                    code: "TARGET_NOT_FOUND",
                    message: `Line 31 is past the end of ${filePath} (30 lines)`,
                    suggestion: "Call get_overview for the line count, or search_content to locate the text first."
                }
            });
        });

        it("centres a window on the first match of a pattern", async () => {
            const result = await createTools().readContent({ absolute_file_path: filePath, target: "value_15" });
            expect(result).toEqual({
                content: linesBetween(5, 25),
                startLine: 5,
                endLine: 25,
                targetType: "pattern",
                mode: "lines"
            });
        });

        it("returns the enclosing item in semantic mode", async () => {
            expect(await createTools().readContent({ absolute_file_path: filePath, target: 8, mode: "semantic" })).toEqual({
                content: linesBetween(7, 8),
                startLine: 7,
                endLine: 8,
                targetType: "line_number",
                mode: "semantic",
                outlineItem: "method greet"
            });
        });

        it("returns only functions and methods in function mode", async () => {
            expect(await createTools().readContent({ absolute_file_path: filePath, target: 8, mode: "function" })).toEqual({
                content: linesBetween(7, 8),
                startLine: 7,
                endLine: 8,
                targetType: "line_number",
                mode: "function",
                outlineItem: "method greet"
            });

            // inside the class but between its methods
            const between = await createTools().readContent({ absolute_file_path: filePath, target: 6, mode: "function" });
            expect(between).toMatchObject({ startLine: 6, endLine: 25, mode: "lines" });
            expect(between.outlineItem).toBeUndefined();
            expect(await createTools().readContent({ absolute_file_path: filePath, target: 6, mode: "semantic" })).toMatchObject({
                startLine: 3,
                endLine: 8,
                outlineItem: "class Greeter"
            });
        });

        it("falls back to a line window outside any item", async () => {
            const result = await createTools().readContent({ absolute_file_path: filePath, target: 20, mode: "semantic" });
            expect(result).toMatchObject({ startLine: 20, endLine: 30, mode: "lines" });
            expect(result.outlineItem).toBeUndefined();
        });

        it("reports a pattern that is nowhere in the file", async () => {
            const response = await createTools().call("read_content", { absolute_file_path: filePath, target: "zzzzqqqq" });
            expect(parseResponse(response)).toMatchObject({
                error: { code: "TARGET_NOT_FOUND", message: `Pattern 'zzzzqqqq' not found in ${filePath}` }
            });
        });
    });

    describe("edit_content", () => {
        it("previews by default", async () => {
            const result = await createTools().editContent({
                absolute_file_path: filePath,
                search_text: "value_30 = 30",
                replace_text: "value_30 = 31"
            });

            expect(result).toMatchObject({ success: true, changesMade: 1, lineNumber: 30, matchKind: "exact" });
            expect(result.backupCreated).toBeUndefined();
            expect(fs.readFileSync(filePath, "utf8")).toBe(CONTENT);
        });

        it("commits with a backup when preview is off", async () => {
            const result = await createTools().editContent({
                absolute_file_path: filePath,
                search_text: "def main():",
                replace_text: "def run():",
                preview: false
            });

            expect(result.success).toBe(true);
            expect(path.dirname(result.backupCreated ?? "")).toBe(path.join(tempDir, ".backups"));
            expect(fs.readFileSync(result.backupCreated ?? "", "utf8")).toBe(CONTENT);
            expect(fs.readFileSync(filePath, "utf8")).toBe(CONTENT.replace("def main():", "def run():"));
        });

        it("warns when fuzzy matching is unavailable", async () => {
            const result = await createTools({ matcher: null }).editContent({
                absolute_file_path: filePath,
                search_text: "def mian():",
                replace_text: "def run():"
            });

            expect(result).toMatchObject({ success: false, matchKind: "none", lineNumber: 0 });
            expect(result.warnings).toEqual(["Fuzzy matching is unavailable; only exact matches were considered"]);
        });

        it("reports a missing file through the tool response", async () => {
            const missing = path.join(tempDir, "missing.py");
            const response = await createTools().call("edit_content", {
                absolute_file_path: missing,
                search_text: "a",
                replace_text: "b"
            });

            expect(parseResponse(response)).toEqual({
                error: {
                    code: "READ_FAILED",
                    message: `Cannot access ${missing}: file not found`,
                    suggestion: NOT_FOUND_SUGGESTION
                }
            });
        });
    });

    describe("call", () => {
        it("serializes results as pretty JSON text", async () => {
            const response = await createTools().call("get_overview", { absolute_file_path: filePath });
            expect(response.isError).toBeUndefined();
            expect(response.content[0].type).toBe("text");
            expect(parseResponse(response)).toMatchObject({ lineCount: 30 });
        });

        it("rejects malformed arguments", async () => {
            const response = await createTools().call("get_overview", {});
            expect(parseResponse(response)).toMatchObject({
                error: { code: "INVALID_ARGUMENTS", message: "absolute_file_path: Required" }
            });
        });
    });
});

describe("tool helpers", () => {
    it("truncates only beyond the limit", () => {
        expect(truncateLine("abc", 3)).toEqual({ text: "abc", truncated: false });
        expect(truncateLine("abcd", 3)).toEqual({ text: "abc...[truncated]", truncated: true });
    });

    it("suggests search terms by extension and size", () => {
        expect(searchHintsFor("/a/app.tsx", 10, [])).toEqual(["function ", "class ", "interface ", "export ", "import "]);
        expect(searchHintsFor("/a/data.log", 9_999, [])).toEqual(["def ", "class ", "import ", "function"]);
        expect(searchHintsFor("/a/data.log", 10_000, [])).toEqual(["def ", "class ", "TODO", "FIXME"]);
    });

    it("recognizes the tool names", () => {
        expect(isToolName("search_content")).toBe(true);
        expect(isToolName("delete_file")).toBe(false);
        expect(TOOL_DEFINITIONS.map((definition) => definition.name)).toEqual([...TOOL_NAMES]);
    });
});
