import { promises as fs } from "fs";
import { PdfFragmentError, toErrorMessage } from "../../errors/OutlineErrors.js";
import type { FragmentExtraction, FragmentSource, TextFragment } from "../../types.js";
import { collapseWhitespace } from "../../utils/TextShape.js";
import { createLogger } from "../../utils/StructuredLogger.js";

const logger = createLogger("PdfFragmentExtractor");

const DEFAULT_MAX_PAGES = 200;
const LINE_Y_TOLERANCE = 2;
const FALLBACK_FONT_SIZE = 12;
const FALLBACK_TOP_Y = 1000;

/** A positioned run of text as the renderer reports it. */
export interface RawTextItem {
    str: string;
    x: number;
    y: number;
    width: number;
    fontSize: number;
    fontName: string;
}

export interface PdfFragmentExtractorOptions {
    maxPages?: number;
}

export type PdfJs = typeof import("pdfjs-dist/legacy/build/pdf.js");
export type PdfDocument = Awaited<ReturnType<PdfJs["getDocument"]>["promise"]>;
type PdfPage = Awaited<ReturnType<PdfDocument["getPage"]>>;
type PdfLoadingTask = ReturnType<PdfJs["getDocument"]>;

function isPdfJs(value: unknown): value is PdfJs {
    return typeof value === "object" && value !== null && "getDocument" in value && typeof value.getDocument === "function";
}

/**
 * The legacy build is a UMD bundle: `require` exposes `getDocument` on the
 * namespace, a native `import()` only on its `default`.
 */
export function resolvePdfJsModule(module: unknown): PdfJs {
    if (isPdfJs(module)) return module;
    if (typeof module === "object" && module !== null && "default" in module && isPdfJs(module.default)) {
        return module.default;
    }
    throw new PdfFragmentError("pdf_parser_missing", "pdfjs-dist does not export getDocument");
}

export function isBoldFontName(fontName: string): boolean {
    const lower = fontName.toLowerCase();
    return lower.includes("bold") || lower.includes("black");
}

/** Most frequent value; ties go to the value seen first. */
export function mostCommon<T>(values: readonly T[]): T | undefined {
    const counts = new Map<T, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    let best: T | undefined;
    let bestCount = 0;
    for (const [value, count] of counts) {
        if (count > bestCount) {
            best = value;
            bestCount = count;
        }
    }
    return best;
}

/**
 * Groups a page's text runs into lines, top to bottom, left to right.
 * Lines shorter than two characters are dropped.
 */
export function groupItemsIntoLines(items: readonly RawTextItem[], page: number, tolerance: number = LINE_Y_TOLERANCE): TextFragment[] {
    const sorted = items
        .filter(item => item.str.trim().length > 0)
        .map((item, index) => ({ item, index }))
        .sort((a, b) => b.item.y - a.item.y || a.item.x - b.item.x || a.index - b.index)
        .map(entry => entry.item);

    const lines: RawTextItem[][] = [];
    for (const item of sorted) {
        const line = lines[lines.length - 1];
        if (line && Math.abs(line[0].y - item.y) <= tolerance) {
            line.push(item);
        } else {
            lines.push([item]);
        }
    }

    const fragments: TextFragment[] = [];
    for (const line of lines) {
        line.sort((a, b) => a.x - b.x);
        let text = "";
        let previous: RawTextItem | undefined;
        for (const item of line) {
            if (previous) {
                const gap = item.x - (previous.x + previous.width);
                if (gap > item.fontSize * 0.3 && !text.endsWith(" ") && !item.str.startsWith(" ")) {
                    text += " ";
                }
            }
            text += item.str;
            previous = item;
        }
        text = collapseWhitespace(text);
        if (text.length <= 1) continue;

        const fontName = mostCommon(line.map(item => item.fontName)) ?? "";
        fragments.push({
            text,
            fontSize: mostCommon(line.map(item => item.fontSize)) ?? 0,
            fontName,
            isBold: isBoldFontName(fontName),
            page,
            yPosition: Math.max(...line.map(item => item.y))
        });
    }
    return fragments;
}

/** Fragments with invented geometry for text recovered without layout. */
export function buildFallbackFragments(text: string): TextFragment[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0)
        .map((line, index) => ({
            text: line,
            fontSize: FALLBACK_FONT_SIZE,
            fontName: "default",
            isBold: false,
            page: 1,
            yPosition: FALLBACK_TOP_Y - index
        }));
}

function normalizeLimit(value: number | undefined, fallback: number): number {
    return value !== undefined && Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

function resolveFontName(page: PdfPage, fontId: string, fontFamily: string | undefined): string {
    try {
        if (page.commonObjs.has(fontId)) {
            const font: unknown = page.commonObjs.get(fontId);
            if (typeof font === "object" && font !== null && "name" in font && typeof font.name === "string" && font.name) {
                return font.name;
            }
        }
    } catch (error) {
        logger.debug("Font object not resolved", { fontId, error: toErrorMessage(error) });
    }
    return fontFamily || fontId;
}

async function readPageItems(page: PdfPage): Promise<RawTextItem[]> {
    // Font objects only reach commonObjs once the page's operator list is built.
    await page.getOperatorList();
    const content = await page.getTextContent();
    const items: RawTextItem[] = [];
    for (const item of content.items) {
        if (!("str" in item)) continue;
        const [, , c, d, x, y] = item.transform.map((value: unknown) => Number(value));
        const fontSize = Math.round(Math.hypot(c ?? 0, d ?? 0) * 100) / 100;
        items.push({
            str: item.str,
            x: Number.isFinite(x) ? x : 0,
            y: Number.isFinite(y) ? y : 0,
            width: Number.isFinite(item.width) ? item.width : 0,
            fontSize,
            fontName: resolveFontName(page, item.fontName, content.styles[item.fontName]?.fontFamily)
        });
    }
    return items;
}

async function readPagePlainText(page: PdfPage): Promise<string> {
    const content = await page.getTextContent();
    let text = "";
    for (const item of content.items) {
        if (!("str" in item)) continue;
        text += item.str;
        text += item.hasEOL ? "\n" : " ";
    }
    return text;
}

export class PdfFragmentExtractor implements FragmentSource {
    private readonly maxPages: number;

    constructor(options: PdfFragmentExtractorOptions = {}) {
        this.maxPages = normalizeLimit(options.maxPages, DEFAULT_MAX_PAGES);
    }

    public async extract(filePath: string): Promise<FragmentExtraction> {
        let buffer: Buffer;
        try {
            buffer = await fs.readFile(filePath);
        } catch (error) {
            throw new PdfFragmentError("pdf_read_failed", toErrorMessage(error));
        }

        let loadingTask: PdfLoadingTask;
        try {
            const pdfjs = resolvePdfJsModule(await import("pdfjs-dist/legacy/build/pdf.js"));
            loadingTask = pdfjs.getDocument({ data: new Uint8Array(buffer) });
        } catch (error) {
            if (error instanceof PdfFragmentError) throw error;
            throw new PdfFragmentError("pdf_parser_missing", toErrorMessage(error));
        }

        const warnings = new Set<string>();
        try {
            const pdf = await loadingTask.promise;
            const pageLimit = Math.min(pdf.numPages, this.maxPages);
            if (pdf.numPages > pageLimit) warnings.add("pdf_page_cap");

            try {
                const fragments = await this.extractStructured(pdf, pageLimit);
                if (fragments.length === 0) warnings.add("pdf_needs_ocr");
                return { fragments, warnings: Array.from(warnings), pageCount: pageLimit };
            } catch (error) {
                logger.warn("Structured extraction failed, using plain text", { filePath, error: toErrorMessage(error) });
                warnings.add("pdf_layout_fallback");
                const fragments = await this.extractPlainText(pdf, pageLimit);
                return { fragments, warnings: Array.from(warnings), pageCount: fragments.length > 0 ? 1 : 0 };
            }
        } catch (error) {
            logger.warn("PDF could not be parsed", { filePath, error: toErrorMessage(error) });
            warnings.add("pdf_parse_failed");
            return { fragments: [], warnings: Array.from(warnings), pageCount: 0 };
        } finally {
            await loadingTask.destroy().catch((error: unknown) => {
                logger.debug("PDF loading task cleanup failed", { filePath, error: toErrorMessage(error) });
            });
        }
    }

    protected async extractStructured(pdf: PdfDocument, pageLimit: number): Promise<TextFragment[]> {
        const fragments: TextFragment[] = [];
        for (let pageNumber = 1; pageNumber <= pageLimit; pageNumber += 1) {
            const page = await pdf.getPage(pageNumber);
            const items = await readPageItems(page);
            fragments.push(...groupItemsIntoLines(items, pageNumber));
            page.cleanup();
        }
        return fragments;
    }

    private async extractPlainText(pdf: PdfDocument, pageLimit: number): Promise<TextFragment[]> {
        const pages: string[] = [];
        for (let pageNumber = 1; pageNumber <= pageLimit; pageNumber += 1) {
            const page = await pdf.getPage(pageNumber);
            pages.push(await readPagePlainText(page));
        }
        return buildFallbackFragments(pages.join("\n"));
    }
}
