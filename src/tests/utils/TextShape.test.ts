import { describe, it, expect } from "@jest/globals";
import {
    clamp01,
    collapseWhitespace,
    countLowercase,
    countUppercase,
    hasLetter,
    isAllCaps,
    isDigitsOnly,
    isTitleCase,
    splitWords
} from "../../utils/TextShape.js";

describe("TextShape", () => {
    it("treats numbered headings as title case", () => {
        expect(isTitleCase("1. Introduction")).toBe(true);
        expect(isTitleCase("O'Neil Report")).toBe(true);
    });

    it("rejects acronyms and lowercase starts as title case", () => {
        expect(isTitleCase("IBM Report")).toBe(false);
        expect(isTitleCase("hello World")).toBe(false);
        expect(isTitleCase("123")).toBe(false);
        expect(isTitleCase("")).toBe(false);
    });

    it("requires a cased character for all caps", () => {
        expect(isAllCaps("ABC 123")).toBe(true);
        expect(isAllCaps("ABC d")).toBe(false);
        expect(isAllCaps("123")).toBe(false);
    });

    it("counts cased characters", () => {
        expect(countLowercase("Hello World")).toBe(8);
        expect(countUppercase("Hello World")).toBe(2);
    });

    it("handles words, whitespace and digits", () => {
        expect(splitWords("  alpha   beta ")).toEqual(["alpha", "beta"]);
        expect(collapseWhitespace(" alpha \n\t beta ")).toBe("alpha beta");
        expect(isDigitsOnly("2024")).toBe(true);
        expect(isDigitsOnly("20 24")).toBe(false);
        expect(hasLetter("-- 42 --")).toBe(false);
        expect(hasLetter("第一章")).toBe(true);
    });

    it("clamps to the unit interval", () => {
        expect(clamp01(1.5)).toBe(1);
        expect(clamp01(-0.2)).toBe(0);
        expect(clamp01(0.25)).toBe(0.25);
    });
});
