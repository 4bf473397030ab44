import type { TextFragment } from "../../types.js";

export function fragment(text: string, overrides: Partial<TextFragment> = {}): TextFragment {
    return {
        text,
        fontSize: 10,
        fontName: "Helvetica",
        isBold: false,
        page: 1,
        yPosition: 500,
        ...overrides
    };
}

export function heading(text: string, fontSize: number, page: number, yPosition: number): TextFragment {
    return fragment(text, { fontSize, fontName: "Helvetica-Bold", isBold: true, page, yPosition });
}

/** Three short pages of a survey write-up: a title, two numbered headings and body copy. */
export function surveyReportFragments(): TextFragment[] {
    return [
        heading("Annual Research Report", 24, 1, 750),
        heading("1. Introduction", 16, 1, 690),
        fragment("the survey gathered responses from several regional offices over a number of weeks and the figures were compiled into a shared workbook for review by the whole team", { page: 1, yPosition: 670 }),
        fragment("each office reported its own totals and the totals were then checked against the previous cycle so that any large swings could be traced back to their source", { page: 1, yPosition: 656 }),
        heading("2. Methods", 16, 2, 760),
        fragment("interviews were held with staff at every site and the notes were coded by two readers working separately who then compared their codes and settled any differences", { page: 2, yPosition: 740 })
    ];
}
