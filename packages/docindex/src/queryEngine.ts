// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * BM25 Query Engine
 *
 * Resolves a free-text query against the inverted index:
 *   tokenize → candidate lookup → path/tag/date filters → BM25 → sort
 *   → top-N
 *
 * All reads for one query happen inside a single store snapshot, so the
 * corpus statistics and the candidate postings describe the same version of
 * the index.
 */

import {
    describeFilters,
    effectiveTime,
    matchesFilters,
    resolveFilters,
    resolveLimit,
    resolveSort,
} from "./filters.js";
import { IndexStore } from "./indexStore.js";
import { makeSnippet } from "./snippet.js";
import { queryTerms } from "./tokenizer.js";
import {
    AppliedFilters,
    CorpusStats,
    DateField,
    IndexedChunk,
    RankedChunk,
    SearchOptions,
    SearchResponse,
    SortMode,
} from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:query");

export const DEFAULT_SEARCH_LIMIT = 10;

export interface Bm25Settings {
    /** Term frequency saturation */
    k1: number;
    /** Length normalization, 0..1 */
    b: number;
}

export const DEFAULT_BM25: Bm25Settings = { k1: 1.5, b: 0.75 };

export interface RankResult {
    query: string;
    terms: string[];
    /** Top chunks, already truncated to the limit */
    ranked: RankedChunk[];
    totalCandidates: number;
    appliedFilters: AppliedFilters;
    fellBack: boolean;
}

type Scored = { chunk: IndexedChunk; score: number; time: number };

export class QueryEngine {
    public readonly bm25: Bm25Settings;

    constructor(
        private store: IndexStore,
        bm25?: Partial<Bm25Settings>,
    ) {
        this.bm25 = { ...DEFAULT_BM25, ...bm25 };
    }

    /**
     * Ranked search. Throws InvalidFilterError for bad options.
     * A query with no usable terms lists the filtered chunks by date instead.
     */
    public search(
        query: string,
        options: SearchOptions = {},
        now: Date = new Date(),
    ): SearchResponse {
        const result = this.rank(query, options, now);
        return {
            query,
            results: result.ranked.map(({ chunk, score, snippet }) => ({
                chunkId: chunk.chunkId,
                path: chunk.path,
                heading: chunk.heading,
                score,
                snippet,
                startLine: chunk.startLine,
                endLine: chunk.endLine,
                tags: chunk.tags,
                signals: { bm25: score },
            })),
            totalCandidates: result.totalCandidates,
            appliedFilters: result.appliedFilters,
            fellBack: result.fellBack,
            generatedAt: now.toISOString(),
        };
    }

    /**
     * Same as search, but keeps the full chunks for callers that need their
     * text.
     */
    public rank(
        query: string,
        options: SearchOptions = {},
        now: Date = new Date(),
    ): RankResult {
        const sort = resolveSort(options.sort);
        const limit = resolveLimit(options.limit, DEFAULT_SEARCH_LIMIT);
        const filters = resolveFilters(options, now);
        const terms = queryTerms(query);
        const fellBack = terms.length === 0;

        const scored = this.store.snapshot(() => {
            if (fellBack) {
                return this.store
                    .listChunks(filters.pathPrefix ?? "")
                    .filter((chunk) => matchesFilters(chunk, filters))
                    .map((chunk) => toScored(chunk, 0, filters.dateField));
            }
            const stats = this.store.getCorpusStats();
            const candidates = this.store.candidatesForTerms(terms);
            // Document frequency is corpus-wide, before any filtering
            const documentFrequency = new Map<string, number>();
            for (const { termFrequencies } of candidates) {
                for (const term of termFrequencies.keys()) {
                    documentFrequency.set(
                        term,
                        (documentFrequency.get(term) ?? 0) + 1,
                    );
                }
            }
            return candidates
                .filter(({ chunk }) => matchesFilters(chunk, filters))
                .map(({ chunk, termFrequencies }) =>
                    toScored(
                        chunk,
                        this.score(
                            termFrequencies,
                            documentFrequency,
                            chunk.tokenCount,
                            stats,
                        ),
                        filters.dateField,
                    ),
                );
        });

        // With no terms there is no relevance: list newest first
        scored.sort(comparator(fellBack && sort === "score" ? "date" : sort));
        const ranked = scored.slice(0, limit).map(({ chunk, score }) => ({
            chunk,
            score,
            snippet: makeSnippet(chunk.text, terms),
        }));

        debug(
            "Query '%s' (%d terms): %d candidates, returning %d%s",
            query,
            terms.length,
            scored.length,
            ranked.length,
            fellBack ? " (fallback listing)" : "",
        );
        return {
            query,
            terms,
            ranked,
            totalCandidates: scored.length,
            appliedFilters: describeFilters(filters, sort, limit),
            fellBack,
        };
    }

    /**
     * Okapi BM25 for one chunk.
     */
    public score(
        termFrequencies: Map<string, number>,
        documentFrequency: Map<string, number>,
        chunkLength: number,
        stats: CorpusStats,
    ): number {
        const { k1, b } = this.bm25;
        const totalChunks = stats.chunkCount;
        const averageLength =
            stats.averageChunkLength > 0 ? stats.averageChunkLength : 1;
        let score = 0;
        for (const [term, tf] of termFrequencies) {
            if (tf <= 0) {
                continue;
            }
            const df = documentFrequency.get(term) ?? 0;
            const idf = Math.log(1 + (totalChunks - df + 0.5) / (df + 0.5));
            const norm = k1 * (1 - b + (b * chunkLength) / averageLength);
            score += (idf * (tf * (k1 + 1))) / (tf + norm);
        }
        return score;
    }
}

function toScored(
    chunk: IndexedChunk,
    score: number,
    dateField: DateField,
): Scored {
    // Falls back to the modification time when the selected date is missing
    const time =
        effectiveTime(chunk, dateField) ??
        effectiveTime(chunk, "modified") ??
        0;
    return { chunk, score, time };
}

function comparator(sort: SortMode): (a: Scored, b: Scored) => number {
    const byLocation = (a: Scored, b: Scored) =>
        compareStrings(a.chunk.path, b.chunk.path) ||
        a.chunk.startLine - b.chunk.startLine;
    switch (sort) {
        case "date":
            return (a, b) =>
                b.time - a.time || b.score - a.score || byLocation(a, b);
        case "date_asc":
            return (a, b) =>
                a.time - b.time || b.score - a.score || byLocation(a, b);
        default:
            return (a, b) =>
                b.score - a.score || b.time - a.time || byLocation(a, b);
    }
}

function compareStrings(x: string, y: string): number {
    return x < y ? -1 : x > y ? 1 : 0;
}
