// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * docindex: incremental BM25 index over documents in an object store
 *
 * Core types shared by the parser, the store, the synchronizer and the query
 * side.
 */

// =========================================================================
// Documents
// =========================================================================

/**
 * Known front-matter fields. Other keys in the YAML block are ignored.
 */
export interface FrontMatter {
    title?: string | undefined;
    /** Explicit document date, ISO-8601 UTC */
    date?: string | undefined;
    /** Normalized, deduplicated, sorted */
    tags: string[];
}

/**
 * A heading-delimited slice of a document, as produced by the parser.
 */
export interface DocumentChunk {
    /** Position of the chunk within its document, from 0 */
    ordinal: number;
    /** Heading text; empty for the preamble before the first heading */
    heading: string;
    /** 1-based, inclusive */
    startLine: number;
    /** 1-based, inclusive */
    endLine: number;
    /** Exactly the source lines startLine..endLine joined with "\n" */
    text: string;
    /** Number of index tokens in text: the chunk length used by BM25 */
    tokenCount: number;
    /** Front-matter tags plus inline #hashtags of this chunk */
    tags: string[];
}

export interface ParsedDocument {
    path: string;
    modifiedAt: string;
    frontMatter: FrontMatter;
    chunks: DocumentChunk[];
    lineCount: number;
}

// =========================================================================
// Stored records
// =========================================================================

/**
 * What the synchronizer hands to the store for one source object.
 */
export interface FileUpsert {
    path: string;
    etag: string;
    /** Source modification time, ISO-8601 */
    modifiedAt: string;
    size: number;
    frontMatter: FrontMatter;
}

export interface FileRecord {
    path: string;
    etag: string;
    modifiedAt: string;
    size: number;
    title?: string | undefined;
    /** Explicit date from front-matter */
    createdAt?: string | undefined;
    tags: string[];
    indexedAt: string;
    chunkCount: number;
}

/**
 * A stored chunk together with the file fields queries filter and sort on.
 */
export interface IndexedChunk {
    chunkId: number;
    path: string;
    ordinal: number;
    heading: string;
    startLine: number;
    endLine: number;
    text: string;
    tokenCount: number;
    tags: string[];
    title?: string | undefined;
    createdAt?: string | undefined;
    modifiedAt: string;
}

/**
 * A chunk that has postings for one or more of the requested terms.
 */
export interface TermCandidate {
    chunk: IndexedChunk;
    /** term → frequency in this chunk, only for requested terms present */
    termFrequencies: Map<string, number>;
}

export interface TermPosting {
    term: string;
    chunkId: number;
    frequency: number;
}

/**
 * Corpus-wide aggregates needed for IDF and length normalization.
 */
export interface CorpusStats {
    fileCount: number;
    chunkCount: number;
    totalTokens: number;
    averageChunkLength: number;
}

export interface UpsertResult {
    path: string;
    /** true when an earlier version of the file was replaced */
    replaced: boolean;
    chunkCount: number;
    removedChunkCount: number;
}

// =========================================================================
// Queries
// =========================================================================

export type DateField = "created" | "modified" | "auto";

export type SortMode = "score" | "date" | "date_asc";

/**
 * Filters shared by search, facets and answers.
 * since/until accept ISO timestamps, YYYY, YYYY-MM, YYYY-MM-DD, Nd or Nm.
 */
export interface SearchFilters {
    tags?: string[] | undefined;
    /** AND semantics when true (default), OR when false */
    requireAllTags?: boolean | undefined;
    since?: string | Date | undefined;
    until?: string | Date | undefined;
    dateField?: DateField | undefined;
    pathPrefix?: string | undefined;
}

export interface SearchOptions extends SearchFilters {
    sort?: SortMode | undefined;
    limit?: number | undefined;
}

/**
 * Filters after validation: the form the filter predicate works with.
 */
export interface ResolvedFilters {
    tags: string[];
    requireAllTags: boolean;
    /** Epoch ms, inclusive */
    since?: number | undefined;
    /** Epoch ms, inclusive */
    until?: number | undefined;
    dateField: DateField;
    pathPrefix?: string | undefined;
}

export interface AppliedFilters {
    tags: string[];
    requireAllTags: boolean;
    since: string | null;
    until: string | null;
    dateField: DateField;
    pathPrefix: string | null;
    sort: SortMode;
    limit: number;
}

export interface ScoreSignals {
    bm25: number;
}

export interface SearchResultItem {
    chunkId: number;
    path: string;
    heading: string;
    score: number;
    snippet: string;
    startLine: number;
    endLine: number;
    tags: string[];
    signals: ScoreSignals;
}

export interface SearchResponse {
    query: string;
    results: SearchResultItem[];
    /** Candidates that survived filtering, before truncation to the limit */
    totalCandidates: number;
    appliedFilters: AppliedFilters;
    /** The query had no usable terms and a plain listing was returned */
    fellBack: boolean;
    generatedAt: string;
}

/**
 * A scored chunk with its full text, for consumers that need more than a
 * snippet.
 */
export interface RankedChunk {
    chunk: IndexedChunk;
    score: number;
    snippet: string;
}
