import {
    DOUBLE_QUOTE, NO_SPACE_AFTER_BASE, NO_SPACE_BEFORE_BASE, SPACING_OVERRIDES,
    isWhitespace, type Language
} from './constants';

export interface SpacingRules {
    readonly noSpaceBefore: ReadonlySet<string>;
    readonly noSpaceAfter: ReadonlySet<string>;
}

export function spacingRulesFor(language: Language): SpacingRules {
    const noSpaceBefore = new Set(NO_SPACE_BEFORE_BASE);
    const noSpaceAfter = new Set(NO_SPACE_AFTER_BASE);

    const override = SPACING_OVERRIDES[language];
    if (override) {
        for (const c of override.allowSpaceBefore) noSpaceBefore.delete(c);
        for (const c of override.allowSpaceAfter) noSpaceAfter.delete(c);
    }

    return { noSpaceBefore, noSpaceAfter };
}

/**
 * Joins tokens with single spaces except where punctuation, quotes or
 * existing whitespace make a space wrong.
 */
export function rejoinTokens(tokens: readonly string[], rules: SpacingRules): string {
    const parts: string[] = [];
    let inQuotes = false;

    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        const isOpeningQuote = token === DOUBLE_QUOTE && !inQuotes;

        parts.push(token);
        if (token === DOUBLE_QUOTE) {
            inQuotes = !inQuotes;
        }

        if (i === tokens.length - 1) break;
        const next = tokens[i + 1];

        let addSpace = true;
        if (isOpeningQuote) {
            addSpace = false;
        } else if (next === DOUBLE_QUOTE && inQuotes) {
            // closing quote
            addSpace = false;
        } else if (rules.noSpaceAfter.has(token) || rules.noSpaceBefore.has(next)) {
            addSpace = false;
        } else if (isWhitespace(token) || isWhitespace(next)) {
            addSpace = false;
        }

        if (addSpace) parts.push(' ');
    }

    return parts.join('');
}
