import { performance } from "perf_hooks";
import { PdfFragmentExtractor } from "../extractors/PdfFragmentExtractor.js";
import { toErrorMessage } from "../../errors/OutlineErrors.js";
import type {
    DocumentProfile,
    FragmentNeighborhood,
    FragmentSource,
    LanguageCode,
    OutlineResult,
    PositionedHeading,
    TextFragment
} from "../../types.js";
import { collapseWhitespace } from "../../utils/TextShape.js";
import { createLogger } from "../../utils/StructuredLogger.js";
import { EnsembleClassifier, EnsembleOptions } from "./classification/EnsembleClassifier.js";
import { deduplicateHeadings } from "./HeadingDeduplicator.js";
import { KEYWORDS, KeywordTables } from "./KeywordTables.js";
import { detectLanguage } from "./LanguageDetector.js";
import { assembleOutline, elapsedSeconds } from "./OutlineAssembler.js";
import { TITLE_STRATEGIES, TitleStrategy, UNTITLED_DOCUMENT, extractTitle } from "./TitleExtractor.js";
import { TocFilter } from "./TocFilter.js";

const logger = createLogger("OutlineExtractor");

export const ERROR_TITLE = "Error Processing Document";
export const NEIGHBOR_WINDOW = 3;

export interface OutlineExtractorOptions {
    source?: FragmentSource;
    classifier?: EnsembleOptions;
    titleStrategies?: readonly TitleStrategy[];
    tables?: KeywordTables;
    /** Injectable clock in milliseconds. */
    now?: () => number;
}

export function buildDocumentProfile(fragments: readonly TextFragment[], detectedLanguage: LanguageCode): DocumentProfile {
    let sum = 0;
    let max = 0;
    for (const fragment of fragments) {
        sum += fragment.fontSize;
        max = Math.max(max, fragment.fontSize);
    }
    return Object.freeze({
        detectedLanguage,
        avgFontSize: fragments.length > 0 ? sum / fragments.length : 0,
        maxFontSize: max
    });
}

export function neighborhoodOf(fragments: readonly TextFragment[], index: number, window: number = NEIGHBOR_WINDOW): FragmentNeighborhood {
    return {
        before: fragments.slice(Math.max(0, index - window), index),
        after: fragments.slice(index + 1, index + 1 + window)
    };
}

function highestPage(fragments: readonly TextFragment[]): number {
    return fragments.reduce((max, fragment) => Math.max(max, fragment.page), 0);
}

/**
 * Fragments in, title plus leveled outline out. Every fault past input
 * handling is folded into an error result instead of thrown.
 */
export class OutlineExtractor {
    private readonly source: FragmentSource;
    private readonly classifier: EnsembleClassifier;
    private readonly titleStrategies: readonly TitleStrategy[];
    private readonly tables: KeywordTables;
    private readonly now: () => number;

    constructor(options: OutlineExtractorOptions = {}) {
        this.tables = options.tables ?? KEYWORDS;
        this.source = options.source ?? new PdfFragmentExtractor();
        this.classifier = new EnsembleClassifier({ tables: this.tables, ...options.classifier });
        this.titleStrategies = options.titleStrategies ?? TITLE_STRATEGIES;
        this.now = options.now ?? (() => performance.now());
    }

    public extractFromFragments(fragments: readonly TextFragment[]): OutlineResult {
        const startedAt = this.now();
        try {
            return this.run(fragments, startedAt);
        } catch (error) {
            return this.failure(error, startedAt);
        }
    }

    public async extractFromFile(filePath: string): Promise<OutlineResult> {
        const startedAt = this.now();
        try {
            const extraction = await this.source.extract(filePath);
            if (extraction.warnings.length > 0) {
                logger.warn("Fragment extraction reported warnings", { filePath, warnings: extraction.warnings });
            }
            logger.debug("Fragments extracted", { filePath, fragments: extraction.fragments.length, pages: extraction.pageCount });
            return this.run(extraction.fragments, startedAt);
        } catch (error) {
            return this.failure(error, startedAt, filePath);
        }
    }

    private run(fragments: readonly TextFragment[], startedAt: number): OutlineResult {
        if (fragments.length === 0) {
            return { title: UNTITLED_DOCUMENT, outline: [], processingTime: elapsedSeconds(startedAt, this.now()) };
        }

        const language = detectLanguage(fragments);
        const profile = buildDocumentProfile(fragments, language);
        const title = extractTitle(fragments, this.titleStrategies, this.tables);
        const toc = new TocFilter(this.tables);
        const titleKey = title.toLowerCase();

        const headings: PositionedHeading[] = [];
        const seen = new Set<string>();
        fragments.forEach((fragment, index) => {
            if (!toc.accept(fragment)) return;
            if (fragment.text.trim().toLowerCase() === titleKey) return;

            const level = this.classifier.classify(fragment, neighborhoodOf(fragments, index), profile);
            if (!level) return;

            const text = collapseWhitespace(fragment.text);
            const key = JSON.stringify([text.toLowerCase(), fragment.page]);
            if (!text || seen.has(key)) return;
            seen.add(key);
            headings.push({ level, text, page: fragment.page, yPosition: fragment.yPosition, sequence: index });
        });

        const result = assembleOutline({
            title,
            headings: deduplicateHeadings(headings),
            startedAt,
            fragmentCount: fragments.length,
            pageCount: highestPage(fragments),
            detectedLanguage: language,
            now: this.now()
        });
        logger.debug("Outline assembled", { title, headings: result.outline.length, language });
        return result;
    }

    private failure(error: unknown, startedAt: number, filePath?: string): OutlineResult {
        const message = toErrorMessage(error);
        logger.error("Outline extraction failed", { filePath, error: message });
        return {
            title: ERROR_TITLE,
            outline: [],
            processingTime: elapsedSeconds(startedAt, this.now()),
            error: message
        };
    }
}
