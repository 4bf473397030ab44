export type LanguageCode = "en" | "ja" | "zh" | "es" | "fr" | "de" | "ru" | "el" | "ar";

export type HeadingLevel = "H1" | "H2" | "H3" | "H4";

/**
 * One line of rendered text. `yPosition` is measured from the bottom of the
 * page, so larger values sit higher on the page.
 */
export interface TextFragment {
    text: string;
    fontSize: number;
    fontName: string;
    isBold: boolean;
    page: number;
    yPosition: number;
}

export interface HeadingCandidate {
    level: HeadingLevel;
    text: string;
    page: number;
}

/** A classified heading still carrying the placement needed for ordering. */
export interface PositionedHeading extends HeadingCandidate {
    yPosition: number;
    sequence: number;
}

export interface DocumentProfile {
    readonly detectedLanguage: LanguageCode;
    readonly avgFontSize: number;
    readonly maxFontSize: number;
}

export interface FragmentNeighborhood {
    /** Up to three preceding fragments, nearest last. */
    before: TextFragment[];
    /** Up to three following fragments, nearest first. */
    after: TextFragment[];
}

export interface OutlineMetrics {
    totalFragments: number;
    headingsFound: number;
    timePerPage: number;
    detectedLanguage: LanguageCode;
}

export interface OutlineResult {
    title: string;
    outline: HeadingCandidate[];
    /** Seconds. */
    processingTime: number;
    metrics?: OutlineMetrics;
    error?: string;
}

export interface FragmentExtraction {
    fragments: TextFragment[];
    warnings: string[];
    pageCount: number;
}

export interface FragmentSource {
    extract(filePath: string): Promise<FragmentExtraction>;
}
