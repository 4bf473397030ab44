import { promises as fs } from "fs";
import path from "path";
import { toErrorMessage } from "../../errors/OutlineErrors.js";
import { createLogger } from "../../utils/StructuredLogger.js";
import { serializeOutlineResult } from "./OutlineAssembler.js";
import type { OutlineExtractor } from "./OutlinePipeline.js";

const logger = createLogger("OutlineBatch");

export interface OutlineBatchOptions {
    inputDir: string;
    outputDir: string;
    extractor: OutlineExtractor;
    timeBudgetMs: number;
}

export interface OutlineBatchFileReport {
    file: string;
    output: string;
    headings: number;
    processingTime: number;
    overBudget: boolean;
    error?: string;
}

export interface OutlineBatchSummary {
    processed: number;
    failed: number;
    overBudget: number;
    totalTime: number;
    files: OutlineBatchFileReport[];
}

export async function listPdfFiles(inputDir: string): Promise<string[]> {
    const entries = await fs.readdir(inputDir, { withFileTypes: true });
    return entries
        .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith(".pdf"))
        .map(entry => entry.name)
        .sort();
}

/** Documents run one after another; a failing file never stops its siblings. */
export async function runOutlineBatch(options: OutlineBatchOptions): Promise<OutlineBatchSummary> {
    const files = await listPdfFiles(options.inputDir);
    await fs.mkdir(options.outputDir, { recursive: true });

    const summary: OutlineBatchSummary = { processed: 0, failed: 0, overBudget: 0, totalTime: 0, files: [] };
    if (files.length === 0) {
        logger.warn("No PDF files found", { inputDir: options.inputDir });
        return summary;
    }

    const budgetSeconds = options.timeBudgetMs / 1000;
    for (const file of files) {
        const output = path.join(options.outputDir, `${path.parse(file).name}.json`);
        const result = await options.extractor.extractFromFile(path.join(options.inputDir, file));
        const report: OutlineBatchFileReport = {
            file,
            output,
            headings: result.outline.length,
            processingTime: result.processingTime,
            overBudget: result.processingTime > budgetSeconds
        };

        try {
            await fs.writeFile(output, JSON.stringify(serializeOutlineResult(result), null, 2), "utf8");
        } catch (error) {
            report.error = toErrorMessage(error);
        }
        if (result.error !== undefined && report.error === undefined) {
            report.error = result.error;
        }

        if (report.error !== undefined) {
            summary.failed += 1;
            logger.error("Document failed", { file, error: report.error });
        } else {
            summary.processed += 1;
            logger.info("Document processed", { file, headings: report.headings, seconds: report.processingTime });
        }
        if (report.overBudget) {
            summary.overBudget += 1;
            logger.warn("Document exceeded time budget", { file, seconds: report.processingTime, budgetSeconds });
        }
        summary.totalTime += result.processingTime;
        summary.files.push(report);
    }

    logger.info("Batch complete", {
        processed: summary.processed,
        failed: summary.failed,
        overBudget: summary.overBudget,
        averageSeconds: summary.totalTime / files.length
    });
    return summary;
}
