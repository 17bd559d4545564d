// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export const SNIPPET_LENGTH = 240;
/** Characters kept before the first hit */
const LEAD = 80;
const ELLIPSIS = "…";

/**
 * A short excerpt of text centered near the first whole-word occurrence of any
 * of the terms, or the start of the text when none occurs. Runs of whitespace
 * are collapsed and cut ends are marked with an ellipsis.
 */
export function makeSnippet(
    text: string,
    terms: string[],
    maxLength: number = SNIPPET_LENGTH,
): string {
    const collapsed = text.replace(/\s+/g, " ").trim();
    if (collapsed.length <= maxLength) {
        return collapsed;
    }
    const hit = firstHit(collapsed, terms);
    const start =
        hit < 0
            ? 0
            : Math.max(0, Math.min(hit - LEAD, collapsed.length - maxLength));
    const end = Math.min(collapsed.length, start + maxLength);
    let snippet = collapsed.slice(start, end).trim();
    if (start > 0) {
        snippet = ELLIPSIS + snippet;
    }
    if (end < collapsed.length) {
        snippet += ELLIPSIS;
    }
    return snippet;
}

/**
 * Offset of the earliest whole-word, case-insensitive match of any term;
 * -1 if none.
 */
export function firstHit(text: string, terms: string[]): number {
    let first = -1;
    for (const term of terms) {
        const match = wordPattern(term).exec(text);
        if (match && (first < 0 || match.index < first)) {
            first = match.index;
        }
    }
    return first;
}

function wordPattern(term: string): RegExp {
    const escaped = term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    const word = "[\\p{L}\\p{N}_]";
    return new RegExp(`(?<!${word})${escaped}(?!${word})`, "iu");
}
