import type { DocumentProfile, FragmentNeighborhood, LanguageCode, TextFragment } from "../../../types.js";
import { clamp01, countChar, countUppercase, isAllCaps, isTitleCase, splitWords } from "../../../utils/TextShape.js";
import { KeywordTables, countMatches, keywordsForLanguage } from "../KeywordTables.js";
import { checkTextShape, PreFilterLimits } from "./PreFilters.js";
import { gapAfter, gapBefore, hasNeighbors, isAtPageTop, isSectionStart } from "./Spacing.js";

export type SignalName =
    | "multi_modal"
    | "statistical"
    | "pattern"
    | "language_specific"
    | "position"
    | "font_agnostic";

export interface SignalContext {
    profile: DocumentProfile;
    neighbors: FragmentNeighborhood;
    tables: KeywordTables;
}

/** One independent heading heuristic; `score` must stay within [0, 1]. */
export interface HeadingSignal {
    readonly name: SignalName;
    readonly weight?: number;
    score(fragment: TextFragment, context: SignalContext): number;
}

export interface SurfaceFeatures {
    length: number;
    wordCount: number;
    uppercaseRatio: number;
    punctuationRatio: number;
    titleCaseWords: number;
    startsWithNumber: boolean;
    containsColon: boolean;
    hasParentheses: boolean;
    sentenceCount: number;
}

const CHAPTER_REFERENCE = /\b(chapter|section|part)\s+\d+/i;
const CHAPTER_OR_APPENDIX_REFERENCE = /\b(chapter|section|part|appendix)\s+\d+/i;
const CJK_CHAPTER = /第[一二三四五六七八九十]+章/;
const CJK_ENUMERATION = /[一二三四五六七八九十]+\./;

const FONT_AGNOSTIC_LIMITS: Readonly<PreFilterLimits> = Object.freeze({
    minChars: 3,
    maxChars: 100,
    maxPeriods: 2,
    maxLowercaseRatio: 0.8,
    minYPosition: Number.NEGATIVE_INFINITY
});

/** "1.", "1.1", "1.1.1", "A." and Roman-numeral prefixes. */
export function numberingScore(text: string): number {
    let score = 0;
    if (/^\d+\.?\s+/.test(text)) {
        score += 0.4;
    } else if (/^\d+\.\d+\.?\s+/.test(text)) {
        score += 0.3;
    } else if (/^\d+\.\d+\.\d+\.?\s+/.test(text)) {
        score += 0.2;
    }
    if (/^[A-Z]\.?\s+/.test(text)) score += 0.3;
    if (/^[IVX]+\.?\s+/.test(text)) score += 0.3;
    return score;
}

export function sequentialScore(text: string): number {
    let score = numberingScore(text);
    if (CHAPTER_REFERENCE.test(text)) score += 0.5;
    return clamp01(score);
}

/** Keyword hits across every language table, plus casing bonuses. */
export function semanticScore(text: string, tables: KeywordTables): number {
    const lower = text.toLowerCase();
    let score = 0;
    for (const keywords of Object.values(tables.semanticKeywords)) {
        score += countMatches(lower, keywords) * 0.15;
    }
    const titleCase = isTitleCase(text);
    if (titleCase) score += 0.4;
    if (isAllCaps(text) && text.length < 50) score += 0.3;
    if (splitWords(text).length <= 3 && titleCase) score += 0.2;
    return clamp01(score);
}

export function extractSurfaceFeatures(text: string): SurfaceFeatures {
    const words = splitWords(text);
    const length = Math.max(1, text.length);
    let punctuation = 0;
    for (const ch of text) {
        if (".,;:!?".includes(ch)) punctuation += 1;
    }
    return {
        length: text.length,
        wordCount: words.length,
        uppercaseRatio: countUppercase(text) / length,
        punctuationRatio: punctuation / length,
        titleCaseWords: words.filter(word => isTitleCase(word)).length,
        startsWithNumber: /^\d+/.test(text),
        containsColon: text.includes(":"),
        hasParentheses: text.includes("(") && text.includes(")"),
        sentenceCount: countChar(text, ".") + countChar(text, "!") + countChar(text, "?")
    };
}

export function statisticalScore(features: SurfaceFeatures): number {
    let score = 0;

    if (features.length >= 5 && features.length <= 80) {
        score += 0.2;
    } else if (features.length > 100) {
        score -= 0.3;
    }

    if (features.wordCount >= 1 && features.wordCount <= 10) {
        score += 0.2;
    } else if (features.wordCount > 15) {
        score -= 0.2;
    }

    if (features.uppercaseRatio >= 0.3 && features.uppercaseRatio <= 0.8) {
        score += 0.3;
    } else if (features.uppercaseRatio > 0.9) {
        score += 0.1;
    }

    if (features.punctuationRatio < 0.1) {
        score += 0.2;
    } else if (features.punctuationRatio > 0.3) {
        score -= 0.3;
    }

    if (features.titleCaseWords >= features.wordCount * 0.5) score += 0.3;
    if (features.containsColon) score += 0.1;
    if (features.hasParentheses) score += 0.1;
    if (features.startsWithNumber) score += 0.2;

    // Headings are rarely full sentences.
    if (features.sentenceCount === 0) {
        score += 0.2;
    } else if (features.sentenceCount > 2) {
        score -= 0.4;
    }

    return clamp01(score);
}

export function patternScore(text: string): number {
    let score = numberingScore(text);
    if (CHAPTER_OR_APPENDIX_REFERENCE.test(text)) score += 0.5;
    if (text.endsWith("?")) score += 0.2;
    if (splitWords(text).length <= 5 && isTitleCase(text)) score += 0.3;
    return clamp01(score);
}

export function languageScore(text: string, language: LanguageCode, tables: KeywordTables): number {
    const keywords = keywordsForLanguage(tables, language);
    // Case folding is harmless for the CJK tables.
    let score = countMatches(text.toLowerCase(), keywords) * 0.2;
    if (language === "ja" || language === "zh") {
        if (CJK_CHAPTER.test(text)) {
            score += 0.4;
        } else if (CJK_ENUMERATION.test(text)) {
            score += 0.3;
        }
    }
    return clamp01(score);
}

export function positionScore(fragment: TextFragment, neighbors: FragmentNeighborhood): number {
    if (!hasNeighbors(neighbors)) return 0.5;

    let score = 0;
    const before = gapBefore(fragment, neighbors);
    const after = gapAfter(fragment, neighbors);
    if (before !== undefined) {
        if (before > 50) {
            score += 0.4;
        } else if (before > 20) {
            score += 0.2;
        }
        if (after !== undefined && before > after) score += 0.1;
    }
    if (isAtPageTop(fragment)) score += 0.2;
    return clamp01(score);
}

export function headingSemanticsScore(text: string, tables: KeywordTables): number {
    let score = countMatches(text.toLowerCase(), tables.headingSemanticKeywords) * 0.1;
    if (isTitleCase(text)) score += 0.3;
    if (isAllCaps(text) && text.length < 50) score += 0.2;
    if (text.endsWith("?")) score += 0.2;
    return clamp01(score);
}

export function headingStructureScore(text: string): number {
    let score = numberingScore(text);
    if (CHAPTER_OR_APPENDIX_REFERENCE.test(text)) score += 0.5;
    if (splitWords(text).length <= 5 && isTitleCase(text)) score += 0.3;
    if (text.includes(":")) score += 0.1;
    return clamp01(score);
}

/** Whitespace around the line and boldness; font size is not consulted. */
export function spacingVisualScore(fragment: TextFragment, neighbors: FragmentNeighborhood): number {
    if (!hasNeighbors(neighbors)) return 0.5;

    let score = 0;
    const before = gapBefore(fragment, neighbors);
    const after = gapAfter(fragment, neighbors);
    if (before !== undefined && before > 30) score += 0.3;
    if (after !== undefined && after > 30) score += 0.2;
    if (fragment.isBold) score += 0.2;
    return clamp01(score);
}

export function fontAgnosticScore(fragment: TextFragment, neighbors: FragmentNeighborhood, tables: KeywordTables): number {
    const text = fragment.text;
    if (checkTextShape(text, fragment.yPosition, FONT_AGNOSTIC_LIMITS)) return 0;

    let score = 0;
    if (isAtPageTop(fragment)) {
        score += 0.4;
    } else if (isSectionStart(fragment, neighbors)) {
        score += 0.3;
    }
    score += headingSemanticsScore(text, tables) * 0.3;
    score += headingStructureScore(text) * 0.3;
    score += spacingVisualScore(fragment, neighbors) * 0.2;
    return clamp01(score);
}
