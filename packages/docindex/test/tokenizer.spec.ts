// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { queryTerms, termFrequencies, tokenize } from "../src/tokenizer.js";

describe("docindex.tokenizer", () => {
    test("tokenize", () => {
        expect(tokenize("Hello, World! It's a C3PO test")).toEqual([
            "hello",
            "world",
            "its",
            "c3po",
            "test",
        ]);
    });
    test("tokenizeUnicode", () => {
        expect(tokenize("Café naïve—résumé")).toEqual([
            "café",
            "naïve",
            "résumé",
        ]);
    });
    test("underscoresStayInWords", () => {
        expect(tokenize("nonexistent_term_xyz snake_case __init__")).toEqual([
            "nonexistent_term_xyz",
            "snake_case",
            "__init__",
        ]);
    });
    test("termFrequencies", () => {
        const counts = termFrequencies("the cat and the hat");
        expect(Object.fromEntries(counts)).toEqual({
            the: 2,
            cat: 1,
            and: 1,
            hat: 1,
        });
    });
    test("queryTerms", () => {
        expect(queryTerms("Machine learning, MACHINE")).toEqual([
            "machine",
            "learning",
        ]);
        expect(queryTerms("a ! ?")).toEqual([]);
    });
});
