// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    AnswerResult,
    CorpusStats,
    FacetResult,
    InvalidFilterError,
    SearchResponse,
    SourceUnavailableError,
    StoreError,
    SyncReport,
    describeError,
} from "docindex";

// Wire shapes use snake_case names

export type SearchResultWire = {
    path: string;
    heading: string;
    score: number;
    snippet: string;
    start_line: number;
    end_line: number;
    tags: string[];
    signals: { bm25: number };
};

export type SearchWire = {
    query: string;
    results: SearchResultWire[];
    total_candidates: number;
    applied_filters: {
        tags: string[];
        require_all_tags: boolean;
        since: string | null;
        until: string | null;
        date_field: string;
        path_prefix: string | null;
        sort: string;
        limit: number;
    };
    fell_back: boolean;
    generated_at: string;
};

export type AnswerWire = {
    answer: string[];
    citations: { ref: string }[];
    related: string[];
    strategy: string;
    degraded: boolean;
};

export type FacetsWire = {
    tags: Record<string, number>;
    time_histogram: { bucket: string; count: number }[];
    total_chunks: number;
};

export type SyncWire = {
    added: number;
    updated: number;
    removed: number;
    unchanged: number;
    errors: { path: string; message: string }[];
    processed: number;
    skipped: number;
    cancelled: boolean;
};

export type HealthWire = {
    status: "ok";
    chunks: number;
    files: number;
};

export type ErrorWire = {
    error: string;
    message: string;
    parameter?: string;
};

export function toSearchWire(response: SearchResponse): SearchWire {
    const filters = response.appliedFilters;
    return {
        query: response.query,
        results: response.results.map((result) => ({
            path: result.path,
            heading: result.heading,
            score: result.score,
            snippet: result.snippet,
            start_line: result.startLine,
            end_line: result.endLine,
            tags: result.tags,
            signals: { bm25: result.signals.bm25 },
        })),
        total_candidates: response.totalCandidates,
        applied_filters: {
            tags: filters.tags,
            require_all_tags: filters.requireAllTags,
            since: filters.since,
            until: filters.until,
            date_field: filters.dateField,
            path_prefix: filters.pathPrefix,
            sort: filters.sort,
            limit: filters.limit,
        },
        fell_back: response.fellBack,
        generated_at: response.generatedAt,
    };
}

export function toAnswerWire(result: AnswerResult): AnswerWire {
    return {
        answer: result.lines,
        citations: result.citations.map((citation) => ({ ref: citation.ref })),
        related: result.related,
        strategy: result.strategy,
        degraded: result.degraded,
    };
}

export function toFacetsWire(result: FacetResult): FacetsWire {
    return {
        tags: result.tags,
        time_histogram: result.timeHistogram,
        total_chunks: result.totalChunks,
    };
}

export function toSyncWire(report: SyncReport): SyncWire {
    return {
        added: report.added,
        updated: report.updated,
        removed: report.removed,
        unchanged: report.unchanged,
        errors: report.errors,
        processed: report.processed,
        skipped: report.skipped,
        cancelled: report.cancelled,
    };
}

export function toHealthWire(stats: CorpusStats): HealthWire {
    return { status: "ok", chunks: stats.chunkCount, files: stats.fileCount };
}

/**
 * HTTP status and body for an error raised by a handler.
 */
export function toErrorResponse(error: unknown): {
    status: number;
    body: ErrorWire;
} {
    if (error instanceof InvalidFilterError) {
        const body: ErrorWire = {
            error: "invalid_filter",
            message: error.message,
        };
        if (error.parameter) {
            body.parameter = error.parameter;
        }
        return { status: 400, body };
    }
    if (error instanceof SourceUnavailableError) {
        return {
            status: 502,
            body: { error: "source_unavailable", message: error.message },
        };
    }
    if (error instanceof StoreError) {
        return {
            status: 500,
            body: { error: "store_error", message: error.message },
        };
    }
    return {
        status: 500,
        body: { error: "internal_error", message: describeError(error) },
    };
}
