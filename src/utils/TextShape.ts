function isUpperChar(ch: string): boolean {
    return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLowerChar(ch: string): boolean {
    return ch !== ch.toUpperCase();
}

/**
 * Title case in the strict sense: there is at least one cased character,
 * uppercase characters only follow uncased ones and lowercase characters only
 * follow cased ones. "1. Introduction" qualifies, "IBM Report" does not.
 */
export function isTitleCase(text: string): boolean {
    let sawCased = false;
    let previousCased = false;
    for (const ch of text) {
        if (isUpperChar(ch)) {
            if (previousCased) return false;
            previousCased = true;
            sawCased = true;
        } else if (isLowerChar(ch)) {
            if (!previousCased) return false;
            previousCased = true;
            sawCased = true;
        } else {
            previousCased = false;
        }
    }
    return sawCased;
}

/** At least one cased character and no lowercase ones. */
export function isAllCaps(text: string): boolean {
    let sawCased = false;
    for (const ch of text) {
        if (isLowerChar(ch)) return false;
        if (isUpperChar(ch)) sawCased = true;
    }
    return sawCased;
}

export function isDigitsOnly(text: string): boolean {
    return /^\d+$/.test(text);
}

export function countLowercase(text: string): number {
    let count = 0;
    for (const ch of text) {
        if (isLowerChar(ch)) count += 1;
    }
    return count;
}

export function countUppercase(text: string): number {
    let count = 0;
    for (const ch of text) {
        if (isUpperChar(ch)) count += 1;
    }
    return count;
}

export function countChar(text: string, ch: string): number {
    let count = 0;
    for (const c of text) {
        if (c === ch) count += 1;
    }
    return count;
}

export function splitWords(text: string): string[] {
    return text.split(/\s+/).filter(word => word.length > 0);
}

export function hasLetter(text: string): boolean {
    return /\p{L}/u.test(text);
}

export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

export function clamp01(value: number): number {
    return Math.max(0, Math.min(1, value));
}
