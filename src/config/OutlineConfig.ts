import { z } from "zod";

export interface OutlineConfig {
    /** Pages rendered per document; later pages are ignored. */
    pdfMaxPages: number;
    /** Observed (not enforced) per-document wall-clock budget. */
    timeBudgetMs: number;
    inputDir: string;
    outputDir: string;
}

export const DEFAULT_OUTLINE_CONFIG: Readonly<OutlineConfig> = Object.freeze({
    pdfMaxPages: 200,
    timeBudgetMs: 10_000,
    inputDir: "/app/input",
    outputDir: "/app/output"
});

const positiveInt = z.coerce.number().int().positive();
const directory = z.string().trim().min(1);

function parseOr<T>(schema: z.ZodType<T>, value: string | undefined, fallback: T): T {
    if (value === undefined || value.trim() === "") return fallback;
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : fallback;
}

export function resolveOutlineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OutlineConfig {
    return {
        pdfMaxPages: parseOr(positiveInt, env.OUTLINE_PDF_MAX_PAGES, DEFAULT_OUTLINE_CONFIG.pdfMaxPages),
        timeBudgetMs: parseOr(positiveInt, env.OUTLINE_TIME_BUDGET_MS, DEFAULT_OUTLINE_CONFIG.timeBudgetMs),
        inputDir: parseOr(directory, env.OUTLINE_INPUT_DIR, DEFAULT_OUTLINE_CONFIG.inputDir),
        outputDir: parseOr(directory, env.OUTLINE_OUTPUT_DIR, DEFAULT_OUTLINE_CONFIG.outputDir)
    };
}
