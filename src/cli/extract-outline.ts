#!/usr/bin/env node
import "../utils/StdoutGuard.js";
import { existsSync } from "fs";
import { resolveOutlineConfigFromEnv } from "../config/OutlineConfig.js";
import { PdfFragmentExtractor } from "../documents/extractors/PdfFragmentExtractor.js";
import { runOutlineBatch } from "../documents/outline/OutlineBatch.js";
import { serializeOutlineResult } from "../documents/outline/OutlineAssembler.js";
import { OutlineExtractor } from "../documents/outline/OutlinePipeline.js";
import { toErrorMessage } from "../errors/OutlineErrors.js";

function parseArgs(argv: string[]) {
    const args = new Map<string, string | boolean>();
    for (let i = 0; i < argv.length; i += 1) {
        const a = argv[i];
        if (!a) continue;
        if (a === "--help" || a === "-h") args.set("help", true);
        else if (a === "--input") args.set("input", argv[++i] ?? "");
        else if (a === "--output") args.set("output", argv[++i] ?? "");
        else if (!a.startsWith("-") && !args.has("file")) args.set("file", a);
    }
    return args;
}

function usage(): string {
    return [
        "Usage: outline-extract <file.pdf>",
        "       outline-extract [--input DIR] [--output DIR]",
        "",
        "Notes:",
        "- With a file, prints the outline JSON to stdout.",
        "- Without one, writes <name>.json for every PDF in the input directory.",
        "- Uses OUTLINE_* env config (page cap, time budget, input/output directories)."
    ].join("\n");
}

function stringArg(args: Map<string, string | boolean>, key: string): string | undefined {
    const value = args.get(key);
    return typeof value === "string" && value.trim() ? value : undefined;
}

async function main() {
    const args = parseArgs(process.argv.slice(2));
    if (args.get("help") === true) {
        console.error(usage());
        return;
    }

    const config = resolveOutlineConfigFromEnv();
    const extractor = new OutlineExtractor({ source: new PdfFragmentExtractor({ maxPages: config.pdfMaxPages }) });

    const file = stringArg(args, "file");
    if (file) {
        if (!existsSync(file)) {
            console.error(JSON.stringify({ ok: false, error: `File not found: ${file}` }));
            process.exitCode = 1;
            return;
        }
        const result = await extractor.extractFromFile(file);
        process.stdout.write(JSON.stringify(serializeOutlineResult(result), null, 2) + "\n");
        return;
    }

    const inputDir = stringArg(args, "input") ?? config.inputDir;
    const outputDir = stringArg(args, "output") ?? config.outputDir;
    if (!existsSync(inputDir)) {
        console.error(usage());
        process.exitCode = 1;
        return;
    }

    const summary = await runOutlineBatch({ inputDir, outputDir, extractor, timeBudgetMs: config.timeBudgetMs });
    console.error(JSON.stringify({
        ok: summary.failed === 0,
        processed: summary.processed,
        failed: summary.failed,
        overBudget: summary.overBudget,
        totalSeconds: summary.totalTime
    }));
}

main().catch((err: unknown) => {
    console.error(JSON.stringify({
        ok: false,
        error: toErrorMessage(err)
    }));
    process.exitCode = 1;
});
