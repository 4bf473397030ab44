import type { HeadingCandidate } from "../../types.js";
import { splitWords } from "../../utils/TextShape.js";

export const SEMANTIC_DUPLICATE_THRESHOLD = 0.7;

/** |A ∩ B| / |A ∪ B| over lower-cased word sets; 0 when either side has no words. */
export function wordSetSimilarity(left: string, right: string): number {
    const a = new Set(splitWords(left.toLowerCase()));
    const b = new Set(splitWords(right.toLowerCase()));
    if (a.size === 0 || b.size === 0) return 0;

    let intersection = 0;
    for (const word of a) {
        if (b.has(word)) intersection += 1;
    }
    return intersection / (a.size + b.size - intersection);
}

/** Keeps the first heading per (text, page, level), ignoring case and outer whitespace. */
export function removeExactDuplicates<T extends HeadingCandidate>(headings: readonly T[]): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const heading of headings) {
        const key = JSON.stringify([heading.text.trim().toLowerCase(), heading.page, heading.level]);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(heading);
    }
    return unique;
}

/** Earlier headings win: a later near-duplicate of any accepted heading is dropped. */
export function removeSemanticDuplicates<T extends HeadingCandidate>(
    headings: readonly T[],
    threshold: number = SEMANTIC_DUPLICATE_THRESHOLD
): T[] {
    const accepted: T[] = [];
    for (const heading of headings) {
        const duplicate = accepted.some(existing => wordSetSimilarity(heading.text, existing.text) > threshold);
        if (!duplicate) accepted.push(heading);
    }
    return accepted;
}

export function deduplicateHeadings<T extends HeadingCandidate>(headings: readonly T[]): T[] {
    return removeSemanticDuplicates(removeExactDuplicates(headings));
}
