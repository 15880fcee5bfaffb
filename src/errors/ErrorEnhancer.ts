import { ZodError } from "zod";
import { AccessError, EditError, SearchError } from "./LargeFileErrors.js";
import { ToolErrorPayload } from "../types.js";

export class ErrorEnhancer {
    /**
     * Converts any failure into the payload returned to the client. Unknown
     * errors get a generic code so internal detail stays in the logs.
     */
    static toPayload(error: unknown): ToolErrorPayload {
        if (error instanceof AccessError) {
            return ErrorEnhancer.enhanceAccess(error);
        }
        if (error instanceof SearchError) {
            return ErrorEnhancer.enhanceSearch(error);
        }
        if (error instanceof EditError) {
            return ErrorEnhancer.enhanceEdit(error);
        }
        if (error instanceof ZodError) {
            return {
                code: "INVALID_ARGUMENTS",
                message: error.issues.map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`).join("; "),
                suggestion: "Check the tool's input schema and resend the call with corrected arguments."
            };
        }
        return {
            code: "INTERNAL_ERROR",
            message: "Unexpected failure while handling the request",
            suggestion: "Retry the call; if it keeps failing, check the server logs."
        };
    }

    static enhanceAccess(error: AccessError): ToolErrorPayload {
        const suggestions: Record<AccessError["kind"], string> = {
            "not-found": "Check that the path is correct and absolute, and that the file still exists.",
            "permission-denied": "Check the file's permissions for the user running the server.",
            "decode-failed": "The file is not valid text in its detected encoding; it may be binary.",
            "not-a-file": "Pass the path of a regular file, not a directory.",
            "write-failed": "Check free disk space and write permission on the file's directory.",
            "invalid-path": "Provide a non-empty absolute file path.",
            "too-large": "Work on a bounded part of the file: locate it with search_content, then use read_content or a narrower edit.",
            "io-failed": "Retry the call; the filesystem reported an unexpected error."
        };
        return {
            code: `ACCESS_${error.kind.toUpperCase().replace(/-/g, "_")}`,
            message: error.message,
            suggestion: suggestions[error.kind]
        };
    }

    static enhanceSearch(error: SearchError): ToolErrorPayload {
        switch (error.code) {
            case "INVALID_PATTERN":
                return { code: error.code, message: error.message, suggestion: "Provide a non-empty search pattern." };
            case "MATCHER_UNAVAILABLE":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: "Disable fuzzy matching or search for the exact text."
                };
            case "READ_FAILED":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: ErrorEnhancer.causeSuggestion(error.cause, "Check the path and the file's permissions.")
                };
            case "TARGET_NOT_FOUND":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: "Call get_overview for the line count, or search_content to locate the text first."
                };
        }
    }

    static enhanceEdit(error: EditError): ToolErrorPayload {
        switch (error.code) {
            case "INVALID_PARAMS":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: "Use a non-empty search text that differs from the replacement, both under 10,000 characters."
                };
            case "READ_FAILED":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: ErrorEnhancer.causeSuggestion(error.cause, "Check the path and the file's permissions.")
                };
            case "MATCHER_UNAVAILABLE":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: "Disable fuzzy matching or adjust the search text to match exactly."
                };
            case "BACKUP_FAILED":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: "The file was not modified. Check that the backup directory is writable."
                };
            case "WRITE_FAILED":
                return {
                    code: error.code,
                    message: error.message,
                    suggestion: "The original file is unchanged. Check free disk space and write permission."
                };
        }
    }

    /** Suggestion for the wrapped access error, when there is one. */
    private static causeSuggestion(cause: unknown, fallback: string): string {
        return cause instanceof AccessError ? ErrorEnhancer.enhanceAccess(cause).suggestion : fallback;
    }
}
