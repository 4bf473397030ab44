import { performance } from "perf_hooks";
import type {
    HeadingCandidate,
    LanguageCode,
    OutlineMetrics,
    OutlineResult,
    PositionedHeading
} from "../../types.js";

export interface AssembleInput {
    title: string;
    headings: readonly PositionedHeading[];
    startedAt: number;
    fragmentCount: number;
    pageCount: number;
    detectedLanguage: LanguageCode;
    now?: number;
}

/** Page first, then top-to-bottom (bottom-origin y, so descending), then reading order. */
export function compareHeadingPlacement(a: PositionedHeading, b: PositionedHeading): number {
    return a.page - b.page || b.yPosition - a.yPosition || a.sequence - b.sequence;
}

export function sortHeadings(headings: readonly PositionedHeading[]): PositionedHeading[] {
    return [...headings].sort(compareHeadingPlacement);
}

function toCandidate(heading: PositionedHeading): HeadingCandidate {
    return { level: heading.level, text: heading.text, page: heading.page };
}

export function elapsedSeconds(startedAt: number, now: number = performance.now()): number {
    return Math.max(0, now - startedAt) / 1000;
}

export function assembleOutline(input: AssembleInput): OutlineResult {
    const outline = sortHeadings(input.headings).map(toCandidate);
    const processingTime = elapsedSeconds(input.startedAt, input.now);
    const metrics: OutlineMetrics = {
        totalFragments: input.fragmentCount,
        headingsFound: outline.length,
        timePerPage: processingTime / Math.max(1, input.pageCount),
        detectedLanguage: input.detectedLanguage
    };
    return { title: input.title, outline, processingTime, metrics };
}

export interface SerializedOutline {
    title: string;
    outline: HeadingCandidate[];
    processing_time: number;
    performance_metrics?: {
        total_elements: number;
        headings_found: number;
        time_per_page: number;
        detected_language: LanguageCode;
    };
    error?: string;
}

export function serializeOutlineResult(result: OutlineResult): SerializedOutline {
    const serialized: SerializedOutline = {
        title: result.title,
        outline: result.outline.map(heading => ({ level: heading.level, text: heading.text, page: heading.page })),
        processing_time: result.processingTime
    };
    if (result.metrics) {
        serialized.performance_metrics = {
            total_elements: result.metrics.totalFragments,
            headings_found: result.metrics.headingsFound,
            time_per_page: result.metrics.timePerPage,
            detected_language: result.metrics.detectedLanguage
        };
    }
    if (result.error !== undefined) {
        serialized.error = result.error;
    }
    return serialized;
}
