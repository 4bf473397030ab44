#!/usr/bin/env node
import "./utils/StdoutGuard.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { resolveOutlineConfigFromEnv } from "./config/OutlineConfig.js";
import { PdfFragmentExtractor } from "./documents/extractors/PdfFragmentExtractor.js";
import { OutlineExtractor } from "./documents/outline/OutlinePipeline.js";
import { OutlineToolHandler } from "./server/OutlineTools.js";
import { createLogger } from "./utils/StructuredLogger.js";

const logger = createLogger("OutlineServer");

const config = resolveOutlineConfigFromEnv();
const handler = new OutlineToolHandler(
    new OutlineExtractor({ source: new PdfFragmentExtractor({ maxPages: config.pdfMaxPages }) })
);

const server = new Server(
    {
        name: "outline-extractor",
        version: "1.0.0"
    },
    {
        capabilities: {
            tools: {}
        }
    }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: handler.listTools()
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handler.handleCallTool(request.params.name, request.params.arguments);
});

async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info("Outline MCP server running on stdio", { pdfMaxPages: config.pdfMaxPages });
}

main().catch((error: unknown) => {
    logger.error("Fatal error in main()", { error: String(error) });
    process.exit(1);
});
