import { z } from "zod";
import rawKeywords from "./data/keywords.json";
import { KeywordTableError } from "../../errors/OutlineErrors.js";
import type { LanguageCode } from "../../types.js";

const wordList = z.array(z.string().min(1)).min(1);

const keywordTablesSchema = z.object({
    boilerplateMarkers: wordList,
    titleRejectMarkers: wordList,
    firstPageRejectPrefixes: wordList,
    titleScoreBonuses: z.record(z.number()),
    titleDescriptors: wordList,
    titlePhrases: wordList,
    mainSectionPhrases: wordList,
    tocIndicators: wordList,
    semanticKeywords: z.record(wordList),
    headingSemanticKeywords: wordList,
    languageKeywords: z.object({
        en: wordList,
        ja: wordList,
        zh: wordList,
        es: wordList,
        fr: wordList,
        de: wordList,
        ru: wordList
    })
});

export type KeywordTables = z.infer<typeof keywordTablesSchema>;

/** Languages with a dedicated keyword table; everything else scores as English. */
export type KeywordLanguage = keyof KeywordTables["languageKeywords"];

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object") {
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
        Object.freeze(value);
    }
    return value;
}

export function parseKeywordTables(input: unknown): KeywordTables {
    const parsed = keywordTablesSchema.safeParse(input);
    if (!parsed.success) {
        throw new KeywordTableError(`Invalid keyword tables: ${parsed.error.issues.map(issue => issue.path.join(".")).join(", ")}`);
    }
    return deepFreeze(parsed.data);
}

export const KEYWORDS: KeywordTables = parseKeywordTables(rawKeywords);

export function keywordsForLanguage(tables: KeywordTables, language: LanguageCode): readonly string[] {
    switch (language) {
        case "ja":
        case "zh":
        case "es":
        case "fr":
        case "de":
        case "ru":
            return tables.languageKeywords[language];
        default:
            return tables.languageKeywords.en;
    }
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
    return needles.some(needle => haystack.includes(needle));
}

export function countMatches(haystack: string, needles: readonly string[]): number {
    let count = 0;
    for (const needle of needles) {
        if (haystack.includes(needle)) count += 1;
    }
    return count;
}
