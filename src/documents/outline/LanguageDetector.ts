import type { LanguageCode, TextFragment } from "../../types.js";

export const DEFAULT_LANGUAGE: LanguageCode = "en";
export const LANGUAGE_SAMPLE_SIZE = 50;

/**
 * Tested in order; the first script found in the sample wins. Spanish and
 * French share accented letters, so a sample holding both resolves to "es".
 */
const SCRIPT_PROBES: ReadonlyArray<{ language: LanguageCode; pattern: RegExp }> = [
    { language: "ja", pattern: /[\u3040-\u30ff]/ },
    { language: "zh", pattern: /[\u4e00-\u9fff]/ },
    { language: "es", pattern: /[ñáéíóúüç]/ },
    { language: "fr", pattern: /[àâäéèêëïîôöùûüÿç]/ },
    { language: "de", pattern: /[äöüß]/ },
    { language: "ru", pattern: /[\u0430-\u044f\u0451]/ },
    { language: "el", pattern: /[\u03b1-\u03c9]/ },
    { language: "ar", pattern: /[\u0621-\u064a]/ }
];

export function detectLanguage(fragments: readonly TextFragment[], sampleSize: number = LANGUAGE_SAMPLE_SIZE): LanguageCode {
    const sample = fragments
        .slice(0, sampleSize)
        .map(fragment => fragment.text)
        .join(" ")
        .toLowerCase();

    for (const probe of SCRIPT_PROBES) {
        if (probe.pattern.test(sample)) {
            return probe.language;
        }
    }
    return DEFAULT_LANGUAGE;
}
