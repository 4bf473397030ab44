import { describe, it, expect } from "@jest/globals";
import { KEYWORDS } from "../../../documents/outline/KeywordTables.js";
import {
    UNTITLED_DOCUMENT,
    extractDescriptorKeywordTitle,
    extractFirstPageTitle,
    extractLargestFontTitle,
    extractPatternAnchoredTitle,
    extractStructuralPatternTitle,
    extractTitle,
    isValidTitle
} from "../../../documents/outline/TitleExtractor.js";
import { fragment } from "../../helpers/fragments.js";

describe("TitleExtractor", () => {
    describe("isValidTitle", () => {
        it("accepts multi-word text of a plausible length", () => {
            expect(isValidTitle("Annual Report 2024")).toBe(true);
        });

        it("rejects boilerplate, single words, numbers and symbols", () => {
            expect(isValidTitle("Copyright Notice Here")).toBe(false);
            expect(isValidTitle("Overview")).toBe(false);
            expect(isValidTitle("12 34 56 78")).toBe(false);
            expect(isValidTitle("Short")).toBe(false);
            expect(isValidTitle("-- -- -- --")).toBe(false);
            expect(isValidTitle("x ".repeat(201))).toBe(false);
        });
    });

    it("returns the placeholder when no strategy finds anything", () => {
        expect(extractTitle([])).toBe(UNTITLED_DOCUMENT);
        expect(extractTitle([fragment("42", { fontSize: 30 })])).toBe(UNTITLED_DOCUMENT);
    });

    it("merges nearby title-like lines", () => {
        const fragments = [
            fragment("Regional Transit", { fontSize: 20, yPosition: 700 }),
            fragment("Expansion Study", { fontSize: 20, yPosition: 670 })
        ];
        expect(extractPatternAnchoredTitle(fragments, KEYWORDS)).toBe("Regional Transit Expansion Study");
        expect(extractTitle(fragments)).toBe("Regional Transit Expansion Study");
    });

    it("skips merged groups that are too short and keeps looking", () => {
        const fragments = [
            fragment("Draft Notes", { page: 1, yPosition: 700 }),
            fragment("Regional Transit Expansion Study", { page: 3, yPosition: 400 })
        ];
        expect(extractPatternAnchoredTitle(fragments, KEYWORDS)).toBe("Regional Transit Expansion Study");
    });

    it("falls through to the largest font when nothing is title-like", () => {
        const fragments = [
            fragment("the design of everyday tools", { fontSize: 24, yPosition: 720 }),
            fragment("chapter one opens with a short anecdote", { fontSize: 10, yPosition: 600 })
        ];
        expect(extractPatternAnchoredTitle(fragments, KEYWORDS)).toBe("");
        expect(extractTitle(fragments)).toBe("the design of everyday tools");
    });

    it("prefers large-font candidates carrying bonus phrases", () => {
        const fragments = [
            fragment("notes on the harbour and river works and more", { fontSize: 20, page: 1, yPosition: 700 }),
            fragment("the digital library programme", { fontSize: 20, page: 3, yPosition: 700 }),
            fragment("body copy in a smaller face", { fontSize: 10, page: 1, yPosition: 600 })
        ];
        expect(extractLargestFontTitle(fragments, KEYWORDS)).toBe("the digital library programme");
    });

    it("finds a title-cased first-page line that is not boilerplate", () => {
        const fragments = [
            fragment("Copyright Holder Name Ltd"),
            fragment("Field Survey Handbook"),
            fragment("Second Page Heading", { page: 2 })
        ];
        expect(extractFirstPageTitle(fragments, KEYWORDS)).toBe("Field Survey Handbook");
    });

    it("matches structural title shapes", () => {
        expect(extractStructuralPatternTitle([fragment("2024 notes"), fragment("Project Atlas Notes")])).toBe("Project Atlas Notes");
    });

    it("matches descriptor keywords", () => {
        expect(extractDescriptorKeywordTitle([fragment("a short guide to composting")], KEYWORDS)).toBe("a short guide to composting");
        expect(extractDescriptorKeywordTitle([fragment("guide")], KEYWORDS)).toBe("");
    });

    it("runs strategies in order and gates each answer", () => {
        const fragments = [fragment("Field Survey Handbook")];
        const calls: string[] = [];
        const title = extractTitle(fragments, [
            () => {
                calls.push("first");
                return "Page";
            },
            () => {
                calls.push("second");
                return "Field Survey Handbook";
            },
            () => {
                calls.push("third");
                return "Never Reached Title";
            }
        ]);
        expect(title).toBe("Field Survey Handbook");
        expect(calls).toEqual(["first", "second"]);
    });
});
