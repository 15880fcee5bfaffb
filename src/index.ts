#!/usr/bin/env node
import "./utils/StdoutGuard.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ListToolsRequestSchema, CallToolRequestSchema, McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { LargeFileConfig, resolveConfigFromEnv } from "./config/LargeFileConfig.js";
import { LargeFileTools, createServices } from "./tools/LargeFileTools.js";
import { TOOL_DEFINITIONS, isToolName } from "./tools/ToolSchemas.js";
import { createLogger } from "./utils/StructuredLogger.js";

const logger = createLogger("LargeFileServer");

export class LargeFileServer {
    private readonly server: Server;
    private readonly tools: LargeFileTools;
    private shutdownRequested = false;

    constructor(private readonly config: LargeFileConfig = resolveConfigFromEnv()) {
        this.server = new Server({
            name: "largefile-mcp",
            version: "1.0.0",
        }, {
            capabilities: { tools: {} },
        });
        this.tools = new LargeFileTools(createServices(this.config));
        this.registerHandlers();
    }

    private registerHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            if (!isToolName(name)) {
                throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
            }
            return this.tools.call(name, args ?? {});
        });
    }

    private setupShutdownHooks(): void {
        const handle = (reason: string) => {
            if (this.shutdownRequested) return;
            this.shutdownRequested = true;
            logger.info("Shutdown requested", { reason });
            void this.server.close()
                .catch((error: unknown) => logger.warn("Server close failed", { error: String(error) }))
                .finally(() => process.exit(0));
        };
        process.on("SIGTERM", () => handle("SIGTERM"));
        process.on("SIGINT", () => handle("SIGINT"));
        process.stdin.on("end", () => handle("stdin_end"));
    }

    public async run(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.setupShutdownHooks();
        logger.info("Large file MCP server running on stdio", {
            cwd: process.cwd(),
            backupDir: this.config.backupDir,
            fuzzyScorer: this.config.fuzzyScorer,
            editLock: this.config.editLock
        });
    }
}

if (require.main === module) {
    new LargeFileServer().run().catch((error: unknown) => {
        logger.error("Fatal error starting server", { error: error instanceof Error ? error.stack ?? error.message : String(error) });
        process.exit(1);
    });
}
