import type { TextFragment } from "../../types.js";
import { KEYWORDS, KeywordTables } from "./KeywordTables.js";

export enum TocState {
    Outside = "outside",
    InsideToc = "inside_toc"
}

export interface TocTransition {
    state: TocState;
    suppress: boolean;
}

/** Tables of contents are expected within the first pages of a document. */
export const TOC_MAX_PAGE = 6;

const TOC_ENTRY_SHAPES: readonly RegExp[] = [
    /^.*\.{3,}\s*\d+$/,
    /^.*\s+\d+$/,
    /^\d+\.\s+.*\s+\d+$/,
    /^[A-Z][a-z].*\s+\d+$/
];

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildIndicatorPattern(indicators: readonly string[]): RegExp {
    return new RegExp(`\\b(?:${indicators.map(escapeRegExp).join("|")})\\b`, "i");
}

const DEFAULT_INDICATOR_PATTERN = buildIndicatorPattern(KEYWORDS.tocIndicators);

export class TocFilter {
    private current: TocState = TocState.Outside;
    private readonly indicatorPattern: RegExp;

    constructor(tables: KeywordTables = KEYWORDS) {
        this.indicatorPattern = tables === KEYWORDS
            ? DEFAULT_INDICATOR_PATTERN
            : buildIndicatorPattern(tables.tocIndicators);
    }

    public get state(): TocState {
        return this.current;
    }

    public hasIndicator(text: string): boolean {
        return this.indicatorPattern.test(text);
    }

    public isTocEntry(text: string): boolean {
        return TOC_ENTRY_SHAPES.some(pattern => pattern.test(text)) || this.hasIndicator(text);
    }

    public startsToc(fragment: TextFragment): boolean {
        return this.hasIndicator(fragment.text)
            || (fragment.page <= TOC_MAX_PAGE && this.isTocEntry(fragment.text));
    }

    /**
     * Pure transition: a trigger always (re)enters the TOC; inside it, the
     * first line without entry shape leaves it and is passed through.
     */
    public transition(state: TocState, fragment: TextFragment): TocTransition {
        if (this.startsToc(fragment)) {
            return { state: TocState.InsideToc, suppress: true };
        }
        if (state === TocState.InsideToc) {
            return this.isTocEntry(fragment.text)
                ? { state: TocState.InsideToc, suppress: true }
                : { state: TocState.Outside, suppress: false };
        }
        return { state: TocState.Outside, suppress: false };
    }

    /** Advances the filter; returns true when the fragment belongs downstream. */
    public accept(fragment: TextFragment): boolean {
        const next = this.transition(this.current, fragment);
        this.current = next.state;
        return !next.suppress;
    }
}
