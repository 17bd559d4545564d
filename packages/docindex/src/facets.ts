// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { InvalidFilterError } from "./errors.js";
import { effectiveTime, matchesFilters, resolveFilters } from "./filters.js";
import { IndexStore } from "./indexStore.js";
import { queryTerms } from "./tokenizer.js";
import { IndexedChunk, SearchFilters } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:facets");

export const MAX_TAG_FACETS = 50;
export const MAX_TIME_BUCKETS = 24;

export type TimeGranularity = "day" | "month" | "year";

const BUCKET_LENGTH: Record<TimeGranularity, number> = {
    day: "YYYY-MM-DD".length,
    month: "YYYY-MM".length,
    year: "YYYY".length,
};

export interface FacetOptions extends SearchFilters {
    /** Narrow the population to chunks matching any query term */
    query?: string | undefined;
    granularity?: TimeGranularity | undefined;
}

export interface TimeBucket {
    /** UTC period: YYYY-MM-DD, YYYY-MM or YYYY */
    bucket: string;
    count: number;
}

export interface FacetResult {
    /** Chunks carrying each tag, most frequent first */
    tags: Record<string, number>;
    /** Newest period first */
    timeHistogram: TimeBucket[];
    /** Chunks in the filtered population */
    totalChunks: number;
}

/**
 * Tag and time distributions over the chunks that pass the filters.
 * Computed from the store on every call.
 */
export class FacetAggregator {
    constructor(private store: IndexStore) {}

    public facets(
        options: FacetOptions = {},
        now: Date = new Date(),
    ): FacetResult {
        const granularity = options.granularity ?? "month";
        if (!Object.hasOwn(BUCKET_LENGTH, granularity)) {
            throw new InvalidFilterError(
                `Unknown granularity '${granularity}': expected day, month or year`,
                "granularity",
            );
        }
        const filters = resolveFilters(options, now);
        const terms = queryTerms(options.query ?? "");

        const population = this.store.snapshot(() => {
            const chunks: IndexedChunk[] =
                terms.length > 0
                    ? this.store
                          .candidatesForTerms(terms)
                          .map((candidate) => candidate.chunk)
                    : this.store.listChunks(filters.pathPrefix ?? "");
            return chunks.filter((chunk) => matchesFilters(chunk, filters));
        });

        const tagCounts = new Map<string, number>();
        const bucketCounts = new Map<string, number>();
        const bucketLength = BUCKET_LENGTH[granularity];
        for (const chunk of population) {
            for (const tag of chunk.tags) {
                tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
            }
            const time = effectiveTime(chunk, filters.dateField);
            if (time !== undefined) {
                const bucket = new Date(time)
                    .toISOString()
                    .slice(0, bucketLength);
                bucketCounts.set(bucket, (bucketCounts.get(bucket) ?? 0) + 1);
            }
        }

        const tags: Record<string, number> = {};
        for (const [tag, count] of [...tagCounts]
            .sort(
                (a, b) =>
                    b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0),
            )
            .slice(0, MAX_TAG_FACETS)) {
            tags[tag] = count;
        }
        const timeHistogram = [...bucketCounts]
            .sort((a, b) => (a[0] < b[0] ? 1 : a[0] > b[0] ? -1 : 0))
            .slice(0, MAX_TIME_BUCKETS)
            .map(([bucket, count]) => ({ bucket, count }));

        debug(
            "Facets over %d chunks: %d tags, %d %s buckets",
            population.length,
            tagCounts.size,
            timeHistogram.length,
            granularity,
        );
        return { tags, timeHistogram, totalChunks: population.length };
    }
}
