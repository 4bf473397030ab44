import type { DocumentProfile, FragmentNeighborhood, HeadingLevel, TextFragment } from "../../../types.js";
import { clamp01 } from "../../../utils/TextShape.js";
import { KEYWORDS, KeywordTables } from "../KeywordTables.js";
import {
    HeadingSignal,
    SignalContext,
    SignalName,
    extractSurfaceFeatures,
    fontAgnosticScore,
    languageScore,
    patternScore,
    positionScore,
    statisticalScore
} from "./HeadingSignals.js";
import { detectMultiModalLevel } from "./MultiModalDetector.js";
import { ENSEMBLE_PRE_FILTER_LIMITS, PreFilterLimits, PreFilterRejection, isMainSection, runPreFilters } from "./PreFilters.js";

export type SignalWeights = Record<SignalName, number>;

export interface LevelThresholds {
    h1: number;
    h2: number;
    h3: number;
    h4: number;
}

export interface EnsembleOptions {
    weights?: Partial<SignalWeights>;
    thresholds?: Partial<LevelThresholds>;
    preFilterLimits?: Partial<PreFilterLimits>;
    signals?: readonly HeadingSignal[];
    tables?: KeywordTables;
}

export const DEFAULT_SIGNAL_WEIGHTS: Readonly<SignalWeights> = Object.freeze({
    multi_modal: 0.15,
    statistical: 0.15,
    pattern: 0.15,
    language_specific: 0.15,
    position: 0.15,
    font_agnostic: 0.25
});

export const DEFAULT_LEVEL_THRESHOLDS: Readonly<LevelThresholds> = Object.freeze({
    h1: 0.5,
    h2: 0.35,
    h3: 0.2,
    h4: 0.1
});

/** The multi-modal detector only votes present or absent. */
export const MULTI_MODAL_VOTE = 0.8;

export const DEFAULT_SIGNALS: readonly HeadingSignal[] = [
    {
        name: "multi_modal",
        weight: DEFAULT_SIGNAL_WEIGHTS.multi_modal,
        score: (fragment, context) =>
            detectMultiModalLevel(fragment, context.neighbors, context.profile, context.tables) ? MULTI_MODAL_VOTE : 0
    },
    {
        name: "statistical",
        weight: DEFAULT_SIGNAL_WEIGHTS.statistical,
        score: fragment => statisticalScore(extractSurfaceFeatures(fragment.text))
    },
    {
        name: "pattern",
        weight: DEFAULT_SIGNAL_WEIGHTS.pattern,
        score: fragment => patternScore(fragment.text)
    },
    {
        name: "language_specific",
        weight: DEFAULT_SIGNAL_WEIGHTS.language_specific,
        score: (fragment, context) => languageScore(fragment.text, context.profile.detectedLanguage, context.tables)
    },
    {
        name: "position",
        weight: DEFAULT_SIGNAL_WEIGHTS.position,
        score: (fragment, context) => positionScore(fragment, context.neighbors)
    },
    {
        name: "font_agnostic",
        weight: DEFAULT_SIGNAL_WEIGHTS.font_agnostic,
        score: (fragment, context) => fontAgnosticScore(fragment, context.neighbors, context.tables)
    }
];

export type ClassificationDecision =
    | { kind: "rejected"; reason: PreFilterRejection; level: null }
    | { kind: "main_section"; level: "H1" }
    | { kind: "scored"; level: HeadingLevel | null; total: number; scores: Partial<Record<SignalName, number>> };

export class EnsembleClassifier {
    private readonly weightOverrides: Partial<SignalWeights>;
    private readonly thresholds: LevelThresholds;
    private readonly limits: PreFilterLimits;
    private readonly signals: readonly HeadingSignal[];
    private readonly tables: KeywordTables;

    constructor(options: EnsembleOptions = {}) {
        this.weightOverrides = { ...options.weights };
        this.thresholds = { ...DEFAULT_LEVEL_THRESHOLDS, ...options.thresholds };
        this.limits = { ...ENSEMBLE_PRE_FILTER_LIMITS, ...options.preFilterLimits };
        this.signals = options.signals ?? DEFAULT_SIGNALS;
        this.tables = options.tables ?? KEYWORDS;
    }

    public classify(fragment: TextFragment, neighbors: FragmentNeighborhood, profile: DocumentProfile): HeadingLevel | null {
        return this.explain(fragment, neighbors, profile).level;
    }

    /** Same decision as `classify`, with the reason or per-signal breakdown attached. */
    public explain(fragment: TextFragment, neighbors: FragmentNeighborhood, profile: DocumentProfile): ClassificationDecision {
        const rejection = runPreFilters(fragment, this.tables, this.limits);
        if (rejection) {
            return { kind: "rejected", reason: rejection, level: null };
        }
        if (isMainSection(fragment.text, this.tables)) {
            return { kind: "main_section", level: "H1" };
        }

        const context: SignalContext = { profile, neighbors, tables: this.tables };
        const scores: Partial<Record<SignalName, number>> = {};
        let total = 0;
        for (const signal of this.signals) {
            const score = clamp01(signal.score(fragment, context));
            scores[signal.name] = score;
            total += score * this.weightOf(signal);
        }
        return { kind: "scored", level: this.levelFor(total), total, scores };
    }

    /** Explicit option first, then the signal's registered weight, then the default for its name. */
    public weightOf(signal: HeadingSignal): number {
        return this.weightOverrides[signal.name] ?? signal.weight ?? DEFAULT_SIGNAL_WEIGHTS[signal.name];
    }

    public levelFor(total: number): HeadingLevel | null {
        if (total > this.thresholds.h1) return "H1";
        if (total > this.thresholds.h2) return "H2";
        if (total > this.thresholds.h3) return "H3";
        if (total > this.thresholds.h4) return "H4";
        return null;
    }
}
