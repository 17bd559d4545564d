// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/** Tokens shorter than this are not indexed */
export const MIN_TOKEN_LENGTH = 2;

const APOSTROPHES = /['’]/g;
const SEPARATORS = /[^\p{L}\p{N}_]+/u;

/**
 * Tokenize text the same way for indexing and for queries:
 * case-fold, drop apostrophes, keep underscores inside words and treat all
 * other punctuation as whitespace.
 */
export function tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const token of text
        .toLowerCase()
        .replace(APOSTROPHES, "")
        .split(SEPARATORS)) {
        if (token.length >= MIN_TOKEN_LENGTH) {
            tokens.push(token);
        }
    }
    return tokens;
}

/**
 * Count term occurrences in text.
 */
export function termFrequencies(text: string): Map<string, number> {
    const counts = new Map<string, number>();
    for (const token of tokenize(text)) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
}

/** Distinct query terms, in first-seen order */
export function queryTerms(query: string): string[] {
    return [...new Set(tokenize(query))];
}
