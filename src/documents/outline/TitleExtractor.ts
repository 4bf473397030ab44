import type { TextFragment } from "../../types.js";
import { hasLetter, isAllCaps, isDigitsOnly, isTitleCase, splitWords } from "../../utils/TextShape.js";
import { KEYWORDS, KeywordTables, containsAny } from "./KeywordTables.js";

export const UNTITLED_DOCUMENT = "Untitled Document";

export type TitleStrategy = (fragments: readonly TextFragment[], tables: KeywordTables) => string;

const MIN_TITLE_CHARS = 8;
const MAX_TITLE_CHARS = 400;

const PROPOSAL_PHRASING: readonly RegExp[] = [
    /RFP:?\s*Request for Proposal/i,
    /Request for Proposal/i,
    /RFP:/i,
    /Request for/i,
    /Proposal for/i,
    // Damaged scans drop the first letters of these words.
    /oposal/i,
    /quest/i
];

const STRUCTURAL_TITLE_SHAPES: readonly RegExp[] = [
    /^[A-Z][a-zA-Z\s]{5,50}$/,
    /^[A-Z][a-zA-Z\s]+:$/,
    /^[A-Z][a-zA-Z\s]+[A-Z]$/
];

interface MergeRule {
    /** Largest vertical distance between lines of one title on a page. */
    maxGap: number;
    /** A next-page line continues the title when it sits above this y. */
    continuationMinY: number;
}

/** Plausible size, not boilerplate, not a bare number, more than one word. */
export function isValidTitle(title: string, tables: KeywordTables = KEYWORDS): boolean {
    if (!title || title.length < MIN_TITLE_CHARS || title.length > MAX_TITLE_CHARS) {
        return false;
    }
    if (containsAny(title.toLowerCase(), tables.titleRejectMarkers)) {
        return false;
    }
    if (isDigitsOnly(title.replace(/ /g, "")) || splitWords(title).length < 2) {
        return false;
    }
    return hasLetter(title);
}

function isBoilerplate(text: string, tables: KeywordTables): boolean {
    return containsAny(text.toLowerCase(), tables.boilerplateMarkers);
}

function byPageThenTop(a: TextFragment, b: TextFragment): number {
    return a.page - b.page || b.yPosition - a.yPosition;
}

function continuesTitle(fragment: TextFragment, page: number, y: number, rule: MergeRule): "same-page" | "next-page" | null {
    if (fragment.page === page && Math.abs(fragment.yPosition - y) < rule.maxGap) {
        return "same-page";
    }
    if (fragment.page === page + 1 && fragment.yPosition > rule.continuationMinY) {
        return "next-page";
    }
    return null;
}

function isTitleLike(text: string): boolean {
    return text.length > 3
        && (isTitleCase(text) || isAllCaps(text))
        && !text.endsWith(".")
        && !isDigitsOnly(text)
        && !/\d/.test(text.slice(0, 3));
}

export function extractPatternAnchoredTitle(fragments: readonly TextFragment[], tables: KeywordTables): string {
    const candidates = fragments
        .slice(0, 150)
        .filter(fragment => !isBoilerplate(fragment.text, tables))
        .filter(fragment => PROPOSAL_PHRASING.some(pattern => pattern.test(fragment.text)) || isTitleLike(fragment.text))
        .sort(byPageThenTop);
    if (candidates.length === 0) return "";

    const rule: MergeRule = { maxGap: 250, continuationMinY: 500 };
    const accept = (parts: string[]): string => {
        const combined = parts.join(" ");
        return combined.length > 20 && isValidTitle(combined, tables) ? combined : "";
    };

    let parts: string[] = [];
    let page = candidates[0].page;
    let y = candidates[0].yPosition;
    for (const fragment of candidates.slice(0, 20)) {
        if (continuesTitle(fragment, page, y, rule) !== null) {
            parts.push(fragment.text);
            page = fragment.page;
            y = fragment.yPosition;
            continue;
        }
        const completed = accept(parts);
        if (completed) return completed;
        parts = [fragment.text];
        page = fragment.page;
        y = fragment.yPosition;
    }
    return accept(parts);
}

function scoreTitle(title: string, tables: KeywordTables): number {
    const lower = title.toLowerCase();
    let score = title.length;
    for (const [phrase, bonus] of Object.entries(tables.titleScoreBonuses)) {
        if (lower.includes(phrase)) score += bonus;
    }
    return score;
}

export function extractLargestFontTitle(fragments: readonly TextFragment[], tables: KeywordTables): string {
    const early = fragments.filter(fragment => fragment.page <= 5);
    if (early.length === 0) return "";

    const maxFontSize = Math.max(...early.map(fragment => fragment.fontSize));
    const large = early
        .filter(fragment => fragment.fontSize >= maxFontSize * 0.8 && fragment.text.length >= 3 && fragment.text.length <= 200)
        .sort(byPageThenTop);
    if (large.length === 0) return "";

    const rule: MergeRule = { maxGap: 200, continuationMinY: 600 };
    let bestTitle = "";
    let bestScore = 0;

    for (let start = 0; start < large.length; start += 1) {
        const end = Math.min(start + 6, large.length);
        for (let stop = start + 1; stop <= end; stop += 1) {
            const parts: string[] = [];
            let page = large[start].page;
            let y = large[start].yPosition;
            for (const fragment of large.slice(start, stop)) {
                if (isBoilerplate(fragment.text, tables)) continue;
                if (continuesTitle(fragment, page, y, rule) === null) break;
                parts.push(fragment.text);
                page = fragment.page;
                y = fragment.yPosition;
            }
            if (parts.length === 0) continue;

            const combined = parts.join(" ");
            if (!isValidTitle(combined, tables)) continue;
            const score = scoreTitle(combined, tables);
            if (score > bestScore) {
                bestScore = score;
                bestTitle = combined;
            }
        }
    }

    return bestTitle || large[0].text;
}

export function extractFirstPageTitle(fragments: readonly TextFragment[], tables: KeywordTables): string {
    const firstPage = fragments.filter(fragment => fragment.page === 1).slice(0, 10);
    for (const fragment of firstPage) {
        const text = fragment.text;
        const lower = text.toLowerCase();
        if (text.length > 10
            && !tables.firstPageRejectPrefixes.some(prefix => lower.startsWith(prefix))
            && !isDigitsOnly(text)
            && isTitleCase(text)) {
            return text;
        }
    }
    return "";
}

export function extractStructuralPatternTitle(fragments: readonly TextFragment[]): string {
    for (const fragment of fragments.slice(0, 20)) {
        if (STRUCTURAL_TITLE_SHAPES.some(pattern => pattern.test(fragment.text))) {
            return fragment.text;
        }
    }
    return "";
}

export function extractDescriptorKeywordTitle(fragments: readonly TextFragment[], tables: KeywordTables): string {
    for (const fragment of fragments.slice(0, 30)) {
        if (fragment.text.length > 10 && containsAny(fragment.text.toLowerCase(), tables.titleDescriptors)) {
            return fragment.text;
        }
    }
    return "";
}

/** Priority order matters: the first strategy whose answer passes the gate wins. */
export const TITLE_STRATEGIES: readonly TitleStrategy[] = [
    extractPatternAnchoredTitle,
    extractLargestFontTitle,
    extractFirstPageTitle,
    extractStructuralPatternTitle,
    extractDescriptorKeywordTitle
];

export function extractTitle(
    fragments: readonly TextFragment[],
    strategies: readonly TitleStrategy[] = TITLE_STRATEGIES,
    tables: KeywordTables = KEYWORDS
): string {
    for (const strategy of strategies) {
        const title = strategy(fragments, tables);
        if (title && isValidTitle(title, tables)) {
            return title;
        }
    }
    return UNTITLED_DOCUMENT;
}
