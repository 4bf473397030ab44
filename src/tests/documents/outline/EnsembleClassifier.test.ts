import { describe, it, expect, jest } from "@jest/globals";
import { EnsembleClassifier } from "../../../documents/outline/classification/EnsembleClassifier.js";
import type { HeadingSignal } from "../../../documents/outline/classification/HeadingSignals.js";
import type { DocumentProfile, FragmentNeighborhood } from "../../../types.js";
import { fragment, heading } from "../../helpers/fragments.js";

const profile: DocumentProfile = { detectedLanguage: "en", avgFontSize: 10, maxFontSize: 18 };
const alone: FragmentNeighborhood = { before: [], after: [] };

describe("EnsembleClassifier", () => {
    it("levels a large bold numbered heading at the page top as H1", () => {
        const classifier = new EnsembleClassifier();
        const decision = classifier.explain(heading("1. Introduction", 18, 1, 900), alone, profile);

        expect(decision.level).toBe("H1");
        if (decision.kind !== "scored") throw new Error(`unexpected ${decision.kind}`);
        expect(decision.scores.multi_modal).toBe(0.8);
        expect(decision.scores.statistical).toBe(1);
        expect(decision.scores.pattern).toBeCloseTo(0.7, 10);
        expect(decision.scores.language_specific).toBeCloseTo(0.2, 10);
        expect(decision.scores.position).toBe(0.5);
        expect(decision.scores.font_agnostic).toBeCloseTo(0.86, 10);
        expect(decision.total).toBeCloseTo(0.695, 10);
    });

    it("rejects long prose at body size", () => {
        const classifier = new EnsembleClassifier();
        const prose = fragment(
            "The committee reviewed the submitted materials at length and agreed that further work was needed before any decision could be made on the budget for next year",
            { page: 3, yPosition: 400 }
        );

        expect(classifier.classify(prose, alone, profile)).toBeNull();
        expect(classifier.explain(prose, alone, profile)).toEqual({ kind: "rejected", reason: "length", level: null });
    });

    it("rejects body-size sentences that mention a main-section phrase", () => {
        const classifier = new EnsembleClassifier();
        const sentence = fragment(
            "This is a long sentence explaining background context in prose form with no structure at all really.",
            { page: 3, yPosition: 400 }
        );
        const request = fragment("We attach a summary of the figures for the board in the appendix below, as requested.");

        expect(classifier.classify(sentence, alone, profile)).toBeNull();
        expect(classifier.explain(sentence, alone, profile)).toEqual({ kind: "rejected", reason: "prose", level: null });
        expect(classifier.explain(request, alone, profile)).toEqual({ kind: "rejected", reason: "prose", level: null });
    });

    it("scores long lines carrying a main-section phrase instead of promoting them", () => {
        const classifier = new EnsembleClassifier();
        const line = fragment("See the Summary table in the appendix for staffing figures by region and year");

        expect(classifier.explain(line, alone, profile).kind).toBe("scored");
    });

    it("short-circuits pre-filter rejections before any signal runs", () => {
        const score = jest.fn<HeadingSignal["score"]>(() => 1);
        const classifier = new EnsembleClassifier({ signals: [{ name: "pattern", score }] });

        expect(classifier.explain(heading("2024", 30, 1, 700), alone, profile)).toEqual({ kind: "rejected", reason: "non_heading_shape", level: null });
        expect(classifier.explain(fragment("ProPosal Draft"), alone, profile)).toEqual({ kind: "rejected", reason: "ocr_corruption", level: null });
        expect(classifier.explain(fragment("Proposal for Funding"), alone, profile)).toEqual({ kind: "rejected", reason: "title_phrase", level: null });
        expect(classifier.explain(fragment("Footer", { yPosition: 12 }), alone, profile)).toEqual({ kind: "rejected", reason: "position", level: null });
        expect(classifier.explain(fragment("unremarkable paragraphs continue"), alone, profile)).toEqual({ kind: "rejected", reason: "lowercase", level: null });
        expect(score).not.toHaveBeenCalled();
    });

    it("promotes main-section phrases to H1 regardless of typography", () => {
        const classifier = new EnsembleClassifier();
        const decision = classifier.explain(fragment("Executive Summary", { fontSize: 8, page: 4, yPosition: 300 }), alone, profile);
        expect(decision).toEqual({ kind: "main_section", level: "H1" });
    });

    it("folds registered signals with their weights", () => {
        const classifier = new EnsembleClassifier({
            signals: [
                { name: "pattern", score: () => 0.6 },
                { name: "position", score: () => 1.4 }
            ],
            weights: { pattern: 0.5, position: 0.3 }
        });

        const decision = classifier.explain(fragment("Scope Of Work"), alone, profile);
        if (decision.kind !== "scored") throw new Error(`unexpected ${decision.kind}`);
        expect(decision.scores).toEqual({ pattern: 0.6, position: 1 });
        expect(decision.total).toBeCloseTo(0.6, 10);
        expect(decision.level).toBe("H1");
    });

    it("uses a signal's registered weight unless an option overrides it", () => {
        const signal: HeadingSignal = { name: "pattern", weight: 0.4, score: () => 1 };
        const registered = new EnsembleClassifier({ signals: [signal] });
        const overridden = new EnsembleClassifier({ signals: [signal], weights: { pattern: 0.6 } });
        const line = fragment("Scope Of Work");

        expect(registered.weightOf(signal)).toBe(0.4);
        expect(registered.classify(line, alone, profile)).toBe("H2");
        expect(overridden.weightOf(signal)).toBe(0.6);
        expect(overridden.classify(line, alone, profile)).toBe("H1");
        expect(registered.weightOf({ name: "font_agnostic", score: () => 0 })).toBe(0.25);
    });

    it("honours custom thresholds", () => {
        const strict = new EnsembleClassifier({ thresholds: { h1: 0.99, h2: 0.98, h3: 0.97, h4: 0.96 } });
        expect(strict.classify(heading("1. Introduction", 18, 1, 900), alone, profile)).toBeNull();
    });

    it("maps totals to levels with strict thresholds", () => {
        const classifier = new EnsembleClassifier();
        expect(classifier.levelFor(0.51)).toBe("H1");
        expect(classifier.levelFor(0.5)).toBe("H2");
        expect(classifier.levelFor(0.35)).toBe("H3");
        expect(classifier.levelFor(0.2)).toBe("H4");
        expect(classifier.levelFor(0.1)).toBeNull();
    });
});
