import type { TextFragment } from "../../../types.js";
import { countChar, countLowercase, splitWords } from "../../../utils/TextShape.js";
import { KeywordTables, containsAny } from "../KeywordTables.js";

export interface PreFilterLimits {
    minChars: number;
    maxChars: number;
    maxPeriods: number;
    maxLowercaseRatio: number;
    minYPosition: number;
}

export const ENSEMBLE_PRE_FILTER_LIMITS: Readonly<PreFilterLimits> = Object.freeze({
    minChars: 3,
    maxChars: 150,
    maxPeriods: 3,
    maxLowercaseRatio: 0.85,
    minYPosition: 30
});

/** Longer lines closed by a full stop read as running text. */
export const PROSE_MIN_WORDS = 10;
/** Main-section phrases only promote lines up to this many words. */
export const MAIN_SECTION_MAX_WORDS = 10;

export type PreFilterRejection =
    | "length"
    | "periods"
    | "lowercase"
    | "position"
    | "prose"
    | "ocr_corruption"
    | "non_heading_shape"
    | "title_phrase";

const OCR_CORRUPTION_SHAPES: readonly RegExp[] = [
    /foooor/,
    /Prr Prr Prr/,
    /Reeeequest/,
    /[a-z]{1,2}[A-Z]{1,2}[a-z]{1,2}/
];

const NON_HEADING_SHAPES: readonly RegExp[] = [
    /^\d+$/,
    /^\$\d+/,
    /^\d+%$/,
    /^\d+\.\d+%$/,
    /^\d+M\s*\(\d+%\)$/,
    /^[A-Z]\s*$/,
    /^\d+\.\d+$/,
    /^(?:January|February|March|April|May|June|July|August|September|October|November|December) \d{4}$/,
    /^\d{4}$/
];

/** Length, sentence, casing and page-position checks shared by several scorers. */
export function checkTextShape(text: string, yPosition: number, limits: PreFilterLimits): PreFilterRejection | null {
    if (text.length < limits.minChars || text.length > limits.maxChars) return "length";
    if (countChar(text, ".") > limits.maxPeriods) return "periods";
    if (countLowercase(text) > text.length * limits.maxLowercaseRatio) return "lowercase";
    if (yPosition < limits.minYPosition) return "position";
    return null;
}

export function isProse(text: string): boolean {
    return /[.!]$/.test(text.trim()) && splitWords(text).length > PROSE_MIN_WORDS;
}

export function runPreFilters(
    fragment: TextFragment,
    tables: KeywordTables,
    limits: PreFilterLimits = ENSEMBLE_PRE_FILTER_LIMITS
): PreFilterRejection | null {
    const text = fragment.text;
    const shape = checkTextShape(text, fragment.yPosition, limits);
    if (shape) return shape;
    if (isProse(text)) return "prose";
    if (OCR_CORRUPTION_SHAPES.some(pattern => pattern.test(text))) return "ocr_corruption";
    if (NON_HEADING_SHAPES.some(pattern => pattern.test(text))) return "non_heading_shape";
    if (containsAny(text.toLowerCase(), tables.titlePhrases)) return "title_phrase";
    return null;
}

export function isMainSection(text: string, tables: KeywordTables): boolean {
    if (splitWords(text).length > MAIN_SECTION_MAX_WORDS) return false;
    return containsAny(text.toLowerCase(), tables.mainSectionPhrases);
}
