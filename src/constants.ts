// Cost of a single character the dictionary does not know. Keeps every
// position reachable so the DP always has a path.
export const UNKNOWN_CHAR_COST = 25;

// Marks a substring that may not become a token (unknown and longer than one
// character). Finite, and larger than any path the search can build from
// dictionary words and unknown single characters.
export const UNREACHABLE_COST = 1e100;

export const DEFAULT_TOP_N = 10;
export const MIN_BEAM_WIDTH = 10;

export const APOSTROPHE = "'";
export const POSSESSIVE_SUFFIX = "'s";
export const DOUBLE_QUOTE = '"';

// Built-in dictionaries, resolved against the resources directory
export const LANGUAGE_FILES = {
    en: 'en_dict.txt.gz',
    de: 'de_dict.txt.gz',
    fr: 'fr_dict.txt.gz',
    es: 'es_dict.txt.gz',
    it: 'it_dict.txt.gz',
    pt: 'pt_dict.txt.gz',
} as const;

export type BuiltinLanguage = keyof typeof LANGUAGE_FILES;
export type Language = BuiltinLanguage | 'custom';

export function isBuiltinLanguage(code: string): code is BuiltinLanguage {
    return Object.prototype.hasOwnProperty.call(LANGUAGE_FILES, code);
}

// === Spacing rules ===

export const NO_SPACE_BEFORE_BASE: ReadonlySet<string> = new Set([
    '.', ',', ';', ':', '!', '?', ')', ']', '}', '%', "'", '’', 's', '»', '›', '-',
]);

export const NO_SPACE_AFTER_BASE: ReadonlySet<string> = new Set([
    '(', '[', '{', '«', '‹', '¡', '¿', '-', '$', '€', '£',
]);

export interface SpacingOverride {
    readonly allowSpaceBefore: readonly string[];
    readonly allowSpaceAfter: readonly string[];
}

// Entries removed from the base sets for a given language
export const SPACING_OVERRIDES: Partial<Record<Language, SpacingOverride>> = {
    // 5 % / Max-Planck-Institut / 5 €
    de: { allowSpaceBefore: ['%', '-'], allowSpaceAfter: ['-', '$', '€', '£'] },
    // « Bonjour ! »
    fr: { allowSpaceBefore: [':', ';', '!', '?', '»', '%'], allowSpaceAfter: ['«'] },
    es: { allowSpaceBefore: ['%'], allowSpaceAfter: [] },
};

// === Character classes ===

const DIGIT_PATTERN = /^\p{Nd}/u;
const WHITESPACE_ONLY = /^\s+$/;

export function startsWithDigit(s: string): boolean {
    return DIGIT_PATTERN.test(s);
}

export function endsWithDigit(s: string): boolean {
    const chars = Array.from(s);
    return chars.length > 0 && DIGIT_PATTERN.test(chars[chars.length - 1]);
}

export function isWhitespace(s: string): boolean {
    return WHITESPACE_ONLY.test(s);
}
