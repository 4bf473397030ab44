import path from "path";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { isBoldFontName } from "../documents/extractors/PdfFragmentExtractor.js";
import { serializeOutlineResult } from "../documents/outline/OutlineAssembler.js";
import type { OutlineExtractor } from "../documents/outline/OutlinePipeline.js";
import type { OutlineResult } from "../types.js";

export interface ToolResponse {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

export const TOOLS: Tool[] = [
    {
        name: "extract_outline",
        description: "Extracts the title and an H1-H4 heading outline from a PDF file.",
        inputSchema: {
            type: "object",
            properties: {
                path: { type: "string", description: "Path to the PDF, absolute or relative to the server's working directory" }
            },
            required: ["path"]
        }
    },
    {
        name: "extract_outline_from_fragments",
        description: "Classifies already-extracted text lines (text, font size, font name, bold, page, bottom-origin y) into a title and outline.",
        inputSchema: {
            type: "object",
            properties: {
                fragments: {
                    type: "array",
                    description: "Lines in reading order",
                    items: {
                        type: "object",
                        properties: {
                            text: { type: "string" },
                            fontSize: { type: "number" },
                            fontName: { type: "string" },
                            isBold: { type: "boolean", description: "Defaults to a guess from the font name" },
                            page: { type: "integer", minimum: 1 },
                            yPosition: { type: "number" }
                        },
                        required: ["text", "fontSize", "page", "yPosition"]
                    }
                }
            },
            required: ["fragments"]
        }
    }
];

const extractOutlineArgs = z.object({
    path: z.string().trim().min(1)
});

const fragmentSchema = z.object({
    text: z.string().trim().min(1),
    fontSize: z.number().nonnegative(),
    fontName: z.string().default(""),
    isBold: z.boolean().optional(),
    page: z.number().int().positive(),
    yPosition: z.number()
});

const fragmentsArgs = z.object({
    fragments: z.array(fragmentSchema)
});

function errorResponse(errorCode: string, message: string, details?: unknown): ToolResponse {
    return {
        isError: true,
        content: [{ type: "text", text: JSON.stringify({ errorCode, message, details }) }]
    };
}

function outlineResponse(result: OutlineResult): ToolResponse {
    const response: ToolResponse = {
        content: [{ type: "text", text: JSON.stringify(serializeOutlineResult(result), null, 2) }]
    };
    if (result.error !== undefined) response.isError = true;
    return response;
}

export class OutlineToolHandler {
    constructor(
        private readonly extractor: OutlineExtractor,
        private readonly cwd: string = process.cwd()
    ) {}

    public listTools(): Tool[] {
        return TOOLS;
    }

    public async handleCallTool(name: string, args: unknown): Promise<ToolResponse> {
        switch (name) {
            case "extract_outline": {
                const parsed = extractOutlineArgs.safeParse(args ?? {});
                if (!parsed.success) {
                    return errorResponse("InvalidArguments", "extract_outline expects { path: string }", parsed.error.issues);
                }
                const result = await this.extractor.extractFromFile(path.resolve(this.cwd, parsed.data.path));
                return outlineResponse(result);
            }
            case "extract_outline_from_fragments": {
                const parsed = fragmentsArgs.safeParse(args ?? {});
                if (!parsed.success) {
                    return errorResponse("InvalidArguments", "extract_outline_from_fragments expects { fragments: TextFragment[] }", parsed.error.issues);
                }
                const fragments = parsed.data.fragments.map(fragment => ({
                    ...fragment,
                    text: fragment.text.trim(),
                    isBold: fragment.isBold ?? isBoldFontName(fragment.fontName)
                }));
                return outlineResponse(this.extractor.extractFromFragments(fragments));
            }
            default:
                return errorResponse("UnknownTool", `Unknown tool: ${name}`);
        }
    }
}
