import { describe, it, expect } from "@jest/globals";
import {
    extractSurfaceFeatures,
    fontAgnosticScore,
    languageScore,
    numberingScore,
    patternScore,
    positionScore,
    sequentialScore,
    spacingVisualScore
} from "../../../documents/outline/classification/HeadingSignals.js";
import { detectMultiModalLevel, fontScore } from "../../../documents/outline/classification/MultiModalDetector.js";
import { KEYWORDS } from "../../../documents/outline/KeywordTables.js";
import type { DocumentProfile } from "../../../types.js";
import { fragment, heading } from "../../helpers/fragments.js";

const profile: DocumentProfile = { detectedLanguage: "en", avgFontSize: 10, maxFontSize: 18 };

describe("HeadingSignals", () => {
    it("scores numbering prefixes", () => {
        expect(numberingScore("1. Scope")).toBeCloseTo(0.4, 10);
        expect(numberingScore("1.1 Scope")).toBeCloseTo(0.3, 10);
        expect(numberingScore("A. Scope")).toBeCloseTo(0.3, 10);
        expect(numberingScore("IV. Results")).toBeCloseTo(0.3, 10);
        // "I" reads as both a letter and a Roman numeral.
        expect(numberingScore("I. Overview")).toBeCloseTo(0.6, 10);
        expect(numberingScore("Scope")).toBe(0);
    });

    it("adds chapter references to sequential and pattern scores", () => {
        expect(sequentialScore("Chapter 3 results")).toBeCloseTo(0.5, 10);
        expect(patternScore("appendix 2 tables")).toBeCloseTo(0.5, 10);
        expect(patternScore("What Is Next?")).toBeCloseTo(0.5, 10);
    });

    it("scores language keywords and CJK chapter markers", () => {
        expect(languageScore("第一章 概要", "ja", KEYWORDS)).toBeCloseTo(0.8, 10);
        expect(languageScore("一. 研究", "zh", KEYWORDS)).toBeCloseTo(0.5, 10);
        expect(languageScore("Introduction", "el", KEYWORDS)).toBeCloseTo(0.2, 10);
    });

    it("extracts surface features", () => {
        expect(extractSurfaceFeatures("Budget (Draft): Phase Two")).toEqual({
            length: 25,
            wordCount: 4,
            uppercaseRatio: 4 / 25,
            punctuationRatio: 1 / 25,
            titleCaseWords: 4,
            startsWithNumber: false,
            containsColon: true,
            hasParentheses: true,
            sentenceCount: 0
        });
    });

    it("scores position from same-page gaps", () => {
        const line = fragment("Scope", { yPosition: 600 });
        expect(positionScore(line, { before: [], after: [] })).toBe(0.5);
        expect(positionScore(line, {
            before: [fragment("above", { yPosition: 680 })],
            after: [fragment("below", { yPosition: 590 })]
        })).toBeCloseTo(0.5, 10);

        const pageTop = fragment("Scope", { page: 2, yPosition: 820 });
        expect(positionScore(pageTop, {
            before: [fragment("previous page", { page: 1, yPosition: 100 })],
            after: [fragment("below", { page: 2, yPosition: 800 })]
        })).toBeCloseTo(0.2, 10);
    });

    it("scores spacing and weight without font size", () => {
        const line = heading("Scope", 10, 1, 600);
        expect(spacingVisualScore(line, {
            before: [fragment("above", { yPosition: 640 })],
            after: [fragment("below", { yPosition: 560 })]
        })).toBeCloseTo(0.7, 10);
    });

    it("returns zero from the font-agnostic scorer for implausible text", () => {
        expect(fontAgnosticScore(fragment("ok"), { before: [], after: [] }, KEYWORDS)).toBe(0);
    });
});

describe("MultiModalDetector", () => {
    it("scores font size relative to the document average", () => {
        expect(fontScore(fragment("Scope", { fontSize: 16 }), profile)).toBeCloseTo(0.9, 10);
        expect(fontScore(heading("Scope", 13, 1, 500), profile)).toBeCloseTo(0.9, 10);
        expect(fontScore(fragment("Scope", { fontSize: 10 }), profile)).toBe(0);
    });

    it("applies its own stricter shape checks", () => {
        expect(detectMultiModalLevel(heading("Scope", 18, 1, 40), { before: [], after: [] }, profile, KEYWORDS)).toBeNull();
    });

    it("votes for a large bold numbered heading", () => {
        expect(detectMultiModalLevel(heading("1. Introduction", 18, 1, 900), { before: [], after: [] }, profile, KEYWORDS)).toBe("H2");
    });
});
