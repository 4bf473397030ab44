import type { DocumentProfile, FragmentNeighborhood, HeadingLevel, TextFragment } from "../../../types.js";
import { clamp01 } from "../../../utils/TextShape.js";
import type { KeywordTables } from "../KeywordTables.js";
import { semanticScore, sequentialScore } from "./HeadingSignals.js";
import { checkTextShape, PreFilterLimits } from "./PreFilters.js";
import { gapAfter, gapBefore, isSectionStart } from "./Spacing.js";

export interface MultiModalScores {
    font: number;
    position: number;
    semantic: number;
    visual: number;
    sequential: number;
}

export const MULTI_MODAL_WEIGHTS: Readonly<MultiModalScores> = Object.freeze({
    font: 0.25,
    position: 0.20,
    semantic: 0.25,
    visual: 0.15,
    sequential: 0.15
});

const MULTI_MODAL_LIMITS: Readonly<PreFilterLimits> = Object.freeze({
    minChars: 3,
    maxChars: 100,
    maxPeriods: 2,
    maxLowercaseRatio: 0.8,
    minYPosition: 50
});

export function fontScore(fragment: TextFragment, profile: DocumentProfile): number {
    const ratio = profile.avgFontSize > 0 ? fragment.fontSize / profile.avgFontSize : 1;
    let score = 0;
    if (ratio > 1.5) {
        score = 0.9;
    } else if (ratio > 1.2) {
        score = 0.7;
    } else if (ratio > 1.1) {
        score = 0.5;
    }
    if (fragment.isBold) score += 0.2;
    return clamp01(score);
}

function visualScore(fragment: TextFragment, neighbors: FragmentNeighborhood): number {
    const before = gapBefore(fragment, neighbors);
    const after = gapAfter(fragment, neighbors);
    return (before !== undefined && before > 30) || (after !== undefined && after > 30) ? 0.4 : 0;
}

export function scoreMultiModal(
    fragment: TextFragment,
    neighbors: FragmentNeighborhood,
    profile: DocumentProfile,
    tables: KeywordTables
): MultiModalScores {
    return {
        font: fontScore(fragment, profile),
        position: isSectionStart(fragment, neighbors) ? 0.8 : 0,
        semantic: semanticScore(fragment.text, tables),
        visual: visualScore(fragment, neighbors),
        sequential: sequentialScore(fragment.text)
    };
}

/**
 * Typography, placement, wording, spacing and numbering folded into one
 * level. Returns null for lines that fail its own shape checks.
 */
export function detectMultiModalLevel(
    fragment: TextFragment,
    neighbors: FragmentNeighborhood,
    profile: DocumentProfile,
    tables: KeywordTables
): HeadingLevel | null {
    if (checkTextShape(fragment.text, fragment.yPosition, MULTI_MODAL_LIMITS)) {
        return null;
    }
    const scores = scoreMultiModal(fragment, neighbors, profile, tables);
    const weights = MULTI_MODAL_WEIGHTS;
    const total = scores.font * weights.font
        + scores.position * weights.position
        + scores.semantic * weights.semantic
        + scores.visual * weights.visual
        + scores.sequential * weights.sequential;

    if (total > 0.7) return "H1";
    if (total > 0.5) return "H2";
    if (total > 0.3) return "H3";
    return null;
}
