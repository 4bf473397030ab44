import type { FragmentNeighborhood, TextFragment } from "../../../types.js";

/** Coordinates are bottom-origin, so the line above has the larger y. */
export const PAGE_TOP_Y = 800;
export const SECTION_BREAK_GAP = 50;

export function hasNeighbors(neighbors: FragmentNeighborhood): boolean {
    return neighbors.before.length > 0 || neighbors.after.length > 0;
}

/** Vertical distance to the preceding line on the same page, if there is one. */
export function gapBefore(fragment: TextFragment, neighbors: FragmentNeighborhood): number | undefined {
    const previous = neighbors.before[neighbors.before.length - 1];
    if (!previous || previous.page !== fragment.page) return undefined;
    return previous.yPosition - fragment.yPosition;
}

/** Vertical distance to the following line on the same page, if there is one. */
export function gapAfter(fragment: TextFragment, neighbors: FragmentNeighborhood): number | undefined {
    const next = neighbors.after[0];
    if (!next || next.page !== fragment.page) return undefined;
    return fragment.yPosition - next.yPosition;
}

/** First line of its page, or separated from the line above by a section-sized gap. */
export function isSectionStart(fragment: TextFragment, neighbors: FragmentNeighborhood): boolean {
    const gap = gapBefore(fragment, neighbors);
    return gap === undefined || gap > SECTION_BREAK_GAP;
}

export function isAtPageTop(fragment: TextFragment, threshold: number = PAGE_TOP_Y): boolean {
    return fragment.yPosition > threshold;
}
