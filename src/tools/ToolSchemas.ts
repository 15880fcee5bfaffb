import { z } from "zod";

export const MAX_SEARCH_RESULTS_LIMIT = 100;

const FilePathArg = z.string().min(1, "absolute_file_path is required");

export const OverviewArgsSchema = z.object({
    absolute_file_path: FilePathArg
});

export const SearchArgsSchema = z.object({
    absolute_file_path: FilePathArg,
    pattern: z.string().min(1, "pattern must not be empty"),
    max_results: z.number().int().min(1).max(MAX_SEARCH_RESULTS_LIMIT).optional(),
    context_lines: z.number().int().min(0).max(50).optional(),
    fuzzy: z.boolean().optional()
});

export const ReadArgsSchema = z.object({
    absolute_file_path: FilePathArg,
    target: z.union([z.number().int().min(1), z.string().min(1)]),
    mode: z.enum(["lines", "semantic", "function"]).optional()
});

export const EditArgsSchema = z.object({
    absolute_file_path: FilePathArg,
    search_text: z.string(),
    replace_text: z.string(),
    fuzzy: z.boolean().optional(),
    preview: z.boolean().optional()
});

export const TOOL_NAMES = ["get_overview", "search_content", "read_content", "edit_content"] as const;
export type ToolName = typeof TOOL_NAMES[number];

export function isToolName(name: string): name is ToolName {
    return TOOL_NAMES.some((tool) => tool === name);
}

export interface ToolDefinition {
    name: ToolName;
    description: string;
    inputSchema: {
        type: "object";
        properties: Record<string, object>;
        required: string[];
    };
}

const filePathProperty = { type: "string", description: "Absolute path to the file" };

export const TOOL_DEFINITIONS: ToolDefinition[] = [
    {
        name: "get_overview",
        description: "Line count, size, encoding, long-line flag, structural outline and suggested search terms for a file. Start here before searching or editing a large file.",
        inputSchema: {
            type: "object",
            properties: { absolute_file_path: filePathProperty },
            required: ["absolute_file_path"]
        }
    },
    {
        name: "search_content",
        description: "Finds lines containing a pattern (exact, plus similarity-scored fuzzy matches by default) with surrounding context. Long lines are truncated.",
        inputSchema: {
            type: "object",
            properties: {
                absolute_file_path: filePathProperty,
                pattern: { type: "string", description: "Text to look for" },
                max_results: { type: "integer", minimum: 1, maximum: MAX_SEARCH_RESULTS_LIMIT, description: "Maximum matches to return (default 20)" },
                context_lines: { type: "integer", minimum: 0, description: "Lines of context before and after each match (default 2)" },
                fuzzy: { type: "boolean", description: "Include approximate matches (default true)" }
            },
            required: ["absolute_file_path", "pattern"]
        }
    },
    {
        name: "read_content",
        description: "Reads a bounded window of a file: 20 lines from a line number, or the lines around the first match of a pattern. Semantic mode returns the enclosing outline item (function, class or section) when one is known; function mode considers only functions and methods.",
        inputSchema: {
            type: "object",
            properties: {
                absolute_file_path: filePathProperty,
                target: {
                    oneOf: [
                        { type: "integer", minimum: 1, description: "1-based line number" },
                        { type: "string", description: "Pattern to locate" }
                    ]
                },
                mode: { type: "string", enum: ["lines", "semantic", "function"], description: "Window shape (default lines)" }
            },
            required: ["absolute_file_path", "target"]
        }
    },
    {
        name: "edit_content",
        description: "Replaces one occurrence of search_text with replace_text. Falls back to the most similar line when fuzzy is on. Preview (the default) shows the diff without writing; otherwise a backup is taken before the atomic write.",
        inputSchema: {
            type: "object",
            properties: {
                absolute_file_path: filePathProperty,
                search_text: { type: "string", description: "Text to replace" },
                replace_text: { type: "string", description: "Replacement text" },
                fuzzy: { type: "boolean", description: "Allow a similarity match when the exact text is absent (default true)" },
                preview: { type: "boolean", description: "Only return the diff (default true)" }
            },
            required: ["absolute_file_path", "search_text", "replace_text"]
        }
    }
];
