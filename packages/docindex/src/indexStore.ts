// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import { DocIndexError, StoreError } from "./errors.js";
import { termFrequencies } from "./tokenizer.js";
import {
    CorpusStats,
    DocumentChunk,
    FileRecord,
    FileUpsert,
    IndexedChunk,
    TermCandidate,
    TermPosting,
    UpsertResult,
} from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:store");

/** Max bound variables per IN (...) query */
const IN_BATCH_SIZE = 500;

type FileRow = {
    path: string;
    etag: string;
    size: number;
    modifiedAt: string;
    createdAt: string | null;
    title: string | null;
    tags: string;
    indexedAt: string;
    chunkCount: number;
};

type ChunkRow = {
    chunkId: number;
    path: string;
    ordinal: number;
    heading: string;
    startLine: number;
    endLine: number;
    text: string;
    tokenCount: number;
    title: string | null;
    createdAt: string | null;
    modifiedAt: string;
};

type ChunkTagRow = { chunkId: number; tag: string };
type CountsRow = { chunkCount: number; totalTokens: number };
type CountRow = { count: number };

const CHUNK_COLUMNS = `c.chunkId, c.path, c.ordinal, c.heading, c.startLine, c.endLine,
    c.text, c.tokenCount, f.title, f.createdAt, f.modifiedAt`;

/**
 * Persistent inverted index: files, heading chunks, chunk tags, term postings
 * and the corpus aggregates BM25 needs.
 *
 * Every write is one SQLite transaction, so a reader never observes a file
 * with a partial chunk set and postings always match the live chunks.
 * Aggregates are adjusted relative to their current value inside the same
 * transaction as the postings.
 */
export class IndexStore {
    private db: Database.Database;
    private sql_getEtag: Database.Statement<[string], { etag: string }>;
    private sql_getFile: Database.Statement<[string], FileRow>;
    private sql_listFiles: Database.Statement<{ prefix: string }, FileRow>;
    private sql_fileCounts: Database.Statement<[string], CountsRow>;
    private sql_deleteChunks: Database.Statement<[string]>;
    private sql_deleteFile: Database.Statement<[string]>;
    private sql_upsertFile: Database.Statement<
        [
            string,
            string,
            number,
            string,
            string | null,
            string | null,
            string,
            string,
            number,
        ]
    >;
    private sql_insertChunk: Database.Statement<
        [string, number, string, number, number, string, number]
    >;
    private sql_insertTag: Database.Statement<[number, string]>;
    private sql_insertPosting: Database.Statement<[string, number, number]>;
    private sql_adjustStats: Database.Statement<[number, number]>;
    private sql_getStats: Database.Statement<[], CountsRow>;
    private sql_countFiles: Database.Statement<[], CountRow>;
    private sql_recomputeStats: Database.Statement<[], CountsRow>;
    private sql_chunksForFile: Database.Statement<[string], ChunkRow>;
    private sql_tagsForFile: Database.Statement<[string], ChunkTagRow>;
    private sql_listChunks: Database.Statement<{ prefix: string }, ChunkRow>;
    private sql_listChunkTags: Database.Statement<
        { prefix: string },
        ChunkTagRow
    >;
    private sql_postingsForChunk: Database.Statement<[number], TermPosting>;

    constructor(db: Database.Database) {
        this.db = db;
        try {
            this.db.pragma("foreign_keys = ON");
            this.initSchema();
        } catch (e) {
            throw new StoreError("initialize", { cause: e });
        }
        this.sql_getEtag = this.db.prepare(
            "SELECT etag FROM files WHERE path = ?",
        );
        this.sql_getFile = this.db.prepare(
            "SELECT * FROM files WHERE path = ?",
        );
        this.sql_listFiles = this.db.prepare(
            "SELECT * FROM files WHERE substr(path, 1, length(@prefix)) = @prefix ORDER BY path",
        );
        this.sql_fileCounts = this.db.prepare(
            "SELECT COUNT(*) AS chunkCount, COALESCE(SUM(tokenCount), 0) AS totalTokens FROM chunks WHERE path = ?",
        );
        this.sql_deleteChunks = this.db.prepare(
            "DELETE FROM chunks WHERE path = ?",
        );
        this.sql_deleteFile = this.db.prepare(
            "DELETE FROM files WHERE path = ?",
        );
        this.sql_upsertFile = this.db.prepare(`
            INSERT INTO files (path, etag, size, modifiedAt, createdAt, title, tags, indexedAt, chunkCount)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT (path) DO UPDATE SET
                etag = excluded.etag,
                size = excluded.size,
                modifiedAt = excluded.modifiedAt,
                createdAt = excluded.createdAt,
                title = excluded.title,
                tags = excluded.tags,
                indexedAt = excluded.indexedAt,
                chunkCount = excluded.chunkCount
        `);
        this.sql_insertChunk = this.db.prepare(`
            INSERT INTO chunks (path, ordinal, heading, startLine, endLine, text, tokenCount)
            VALUES (?, ?, ?, ?, ?, ?, ?)
        `);
        this.sql_insertTag = this.db.prepare(
            "INSERT OR IGNORE INTO chunk_tags (chunkId, tag) VALUES (?, ?)",
        );
        this.sql_insertPosting = this.db.prepare(
            "INSERT INTO postings (term, chunkId, frequency) VALUES (?, ?, ?)",
        );
        this.sql_adjustStats = this.db.prepare(
            "UPDATE corpus_stats SET chunkCount = chunkCount + ?, totalTokens = totalTokens + ? WHERE id = 1",
        );
        this.sql_getStats = this.db.prepare(
            "SELECT chunkCount, totalTokens FROM corpus_stats WHERE id = 1",
        );
        this.sql_countFiles = this.db.prepare(
            "SELECT COUNT(*) AS count FROM files",
        );
        this.sql_recomputeStats = this.db.prepare(
            "SELECT COUNT(*) AS chunkCount, COALESCE(SUM(tokenCount), 0) AS totalTokens FROM chunks",
        );
        this.sql_chunksForFile = this.db.prepare(`
            SELECT ${CHUNK_COLUMNS}
            FROM chunks c JOIN files f ON f.path = c.path
            WHERE c.path = ?
            ORDER BY c.ordinal
        `);
        this.sql_tagsForFile = this.db.prepare(`
            SELECT t.chunkId, t.tag
            FROM chunk_tags t JOIN chunks c ON c.chunkId = t.chunkId
            WHERE c.path = ?
            ORDER BY t.tag
        `);
        this.sql_listChunks = this.db.prepare(`
            SELECT ${CHUNK_COLUMNS}
            FROM chunks c JOIN files f ON f.path = c.path
            WHERE substr(c.path, 1, length(@prefix)) = @prefix
            ORDER BY c.path, c.ordinal
        `);
        this.sql_listChunkTags = this.db.prepare(`
            SELECT t.chunkId, t.tag
            FROM chunk_tags t JOIN chunks c ON c.chunkId = t.chunkId
            WHERE substr(c.path, 1, length(@prefix)) = @prefix
            ORDER BY t.tag
        `);
        this.sql_postingsForChunk = this.db.prepare(
            "SELECT term, chunkId, frequency FROM postings WHERE chunkId = ? ORDER BY term",
        );
    }

    /**
     * Open (or create) a store backed by a database file.
     * Pass ":memory:" for a private in-memory store.
     */
    static open(filePath: string, createNew: boolean = false): IndexStore {
        let db: Database.Database;
        try {
            if (filePath !== ":memory:") {
                if (createNew) {
                    deleteDatabase(filePath);
                }
                fs.mkdirSync(path.dirname(filePath), { recursive: true });
            }
            db = new Database(filePath);
            db.pragma("journal_mode = WAL");
        } catch (e) {
            throw new StoreError("open", { cause: e });
        }
        debug("Opened index store at %s", filePath);
        return new IndexStore(db);
    }

    public get isOpen(): boolean {
        return this.db.open;
    }

    // =========================================================================
    // Writes
    // =========================================================================

    /**
     * Replace everything stored for a file with a new version, atomically.
     */
    public upsertFile(file: FileUpsert, chunks: DocumentChunk[]): UpsertResult {
        return this.guard("upsertFile", () =>
            this.db.transaction(() => {
                const existed = this.sql_getEtag.get(file.path) !== undefined;
                const previous = this.sql_fileCounts.get(file.path) ?? {
                    chunkCount: 0,
                    totalTokens: 0,
                };
                this.sql_deleteChunks.run(file.path);
                this.sql_upsertFile.run(
                    file.path,
                    file.etag,
                    file.size,
                    file.modifiedAt,
                    file.frontMatter.date ?? null,
                    file.frontMatter.title ?? null,
                    JSON.stringify(file.frontMatter.tags),
                    new Date().toISOString(),
                    chunks.length,
                );

                let addedTokens = 0;
                for (const chunk of chunks) {
                    addedTokens += this.insertChunk(file.path, chunk);
                }
                this.sql_adjustStats.run(
                    chunks.length - previous.chunkCount,
                    addedTokens - previous.totalTokens,
                );

                debug(
                    "Upserted %s: %d chunks (replaced %d)",
                    file.path,
                    chunks.length,
                    previous.chunkCount,
                );
                return {
                    path: file.path,
                    replaced: existed,
                    chunkCount: chunks.length,
                    removedChunkCount: previous.chunkCount,
                };
            })(),
        );
    }

    /**
     * Remove a file with its chunks, tags and postings.
     * Returns false (and changes nothing) for an unknown path.
     */
    public deleteFile(filePath: string): boolean {
        return this.guard("deleteFile", () =>
            this.db.transaction(() => {
                const previous = this.sql_fileCounts.get(filePath) ?? {
                    chunkCount: 0,
                    totalTokens: 0,
                };
                // Cascades to chunks, chunk_tags and postings
                const result = this.sql_deleteFile.run(filePath);
                if (result.changes === 0) {
                    return false;
                }
                this.sql_adjustStats.run(
                    -previous.chunkCount,
                    -previous.totalTokens,
                );
                debug(
                    "Deleted %s (%d chunks)",
                    filePath,
                    previous.chunkCount,
                );
                return true;
            })(),
        );
    }

    private insertChunk(filePath: string, chunk: DocumentChunk): number {
        const frequencies = termFrequencies(chunk.text);
        let tokenCount = 0;
        for (const frequency of frequencies.values()) {
            tokenCount += frequency;
        }
        const result = this.sql_insertChunk.run(
            filePath,
            chunk.ordinal,
            chunk.heading,
            chunk.startLine,
            chunk.endLine,
            chunk.text,
            tokenCount,
        );
        const chunkId = Number(result.lastInsertRowid);
        for (const tag of chunk.tags) {
            this.sql_insertTag.run(chunkId, tag);
        }
        for (const [term, frequency] of frequencies) {
            this.sql_insertPosting.run(term, chunkId, frequency);
        }
        return tokenCount;
    }

    // =========================================================================
    // Reads
    // =========================================================================

    /**
     * The stored change token, or undefined when the path is not indexed.
     */
    public getEtag(filePath: string): string | undefined {
        return this.guard(
            "getEtag",
            () => this.sql_getEtag.get(filePath)?.etag,
        );
    }

    public getFile(filePath: string): FileRecord | undefined {
        return this.guard("getFile", () => {
            const row = this.sql_getFile.get(filePath);
            return row ? rowToFile(row) : undefined;
        });
    }

    public listFiles(prefix: string = ""): FileRecord[] {
        return this.guard("listFiles", () =>
            this.sql_listFiles.all({ prefix }).map(rowToFile),
        );
    }

    public listPaths(prefix: string = ""): string[] {
        return this.listFiles(prefix).map((f) => f.path);
    }

    /**
     * Chunks of one file, in document order.
     */
    public getChunks(filePath: string): IndexedChunk[] {
        return this.guard("getChunks", () =>
            this.snapshot(() =>
                attachTags(
                    this.sql_chunksForFile.all(filePath),
                    this.sql_tagsForFile.all(filePath),
                ),
            ),
        );
    }

    /**
     * All chunks whose path starts with prefix, ordered by path then position.
     */
    public listChunks(prefix: string = ""): IndexedChunk[] {
        return this.guard("listChunks", () =>
            this.snapshot(() =>
                attachTags(
                    this.sql_listChunks.all({ prefix }),
                    this.sql_listChunkTags.all({ prefix }),
                ),
            ),
        );
    }

    /**
     * Union of chunks with a posting for any of the terms, with the
     * frequency of each requested term found in them.
     */
    public candidatesForTerms(terms: string[]): TermCandidate[] {
        const uniqueTerms = [...new Set(terms)];
        if (uniqueTerms.length === 0) {
            return [];
        }
        return this.guard("candidatesForTerms", () =>
            this.snapshot(() => {
                const frequencies = new Map<number, Map<string, number>>();
                for (const batch of batches(uniqueTerms, IN_BATCH_SIZE)) {
                    const rows = this.db
                        .prepare<string[], TermPosting>(
                            `SELECT term, chunkId, frequency FROM postings WHERE term IN (${makeInPlaceholders(batch.length)})`,
                        )
                        .all(...batch);
                    for (const row of rows) {
                        let chunkTerms = frequencies.get(row.chunkId);
                        if (!chunkTerms) {
                            chunkTerms = new Map();
                            frequencies.set(row.chunkId, chunkTerms);
                        }
                        chunkTerms.set(row.term, row.frequency);
                    }
                }
                const chunks = this.loadChunks([...frequencies.keys()]);
                return chunks.map((chunk) => ({
                    chunk,
                    termFrequencies:
                        frequencies.get(chunk.chunkId) ?? new Map(),
                }));
            }),
        );
    }

    public getPostings(chunkId: number): TermPosting[] {
        return this.guard("getPostings", () =>
            this.sql_postingsForChunk.all(chunkId),
        );
    }

    /**
     * The maintained corpus aggregates.
     */
    public getCorpusStats(): CorpusStats {
        return this.guard("getCorpusStats", () =>
            this.snapshot(() =>
                toCorpusStats(
                    this.sql_getStats.get() ?? {
                        chunkCount: 0,
                        totalTokens: 0,
                    },
                    this.sql_countFiles.get()?.count ?? 0,
                ),
            ),
        );
    }

    /**
     * Aggregates recomputed from the chunk table; equal to getCorpusStats()
     * whenever the store is consistent.
     */
    public recomputeCorpusStats(): CorpusStats {
        return this.guard("recomputeCorpusStats", () =>
            this.snapshot(() =>
                toCorpusStats(
                    this.sql_recomputeStats.get() ?? {
                        chunkCount: 0,
                        totalTokens: 0,
                    },
                    this.sql_countFiles.get()?.count ?? 0,
                ),
            ),
        );
    }

    /**
     * Run several reads inside one read transaction so they all see the
     * same committed version of the index.
     */
    public snapshot<T>(reads: () => T): T {
        return this.guard("snapshot", () => this.db.transaction(reads)());
    }

    public close(): void {
        if (this.db.open) {
            this.db.close();
            debug("Closed index store");
        }
    }

    private loadChunks(chunkIds: number[]): IndexedChunk[] {
        const sorted = [...chunkIds].sort((a, b) => a - b);
        const chunks: IndexedChunk[] = [];
        for (const batch of batches(sorted, IN_BATCH_SIZE)) {
            const placeholders = makeInPlaceholders(batch.length);
            const rows = this.db
                .prepare<number[], ChunkRow>(
                    `SELECT ${CHUNK_COLUMNS}
                     FROM chunks c JOIN files f ON f.path = c.path
                     WHERE c.chunkId IN (${placeholders})
                     ORDER BY c.chunkId`,
                )
                .all(...batch);
            const tags = this.db
                .prepare<number[], ChunkTagRow>(
                    `SELECT chunkId, tag FROM chunk_tags WHERE chunkId IN (${placeholders}) ORDER BY tag`,
                )
                .all(...batch);
            chunks.push(...attachTags(rows, tags));
        }
        return chunks;
    }

    private initSchema(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS files (
                path TEXT PRIMARY KEY,
                etag TEXT NOT NULL,
                size INTEGER NOT NULL,
                modifiedAt TEXT NOT NULL,
                createdAt TEXT,
                title TEXT,
                tags TEXT NOT NULL DEFAULT '[]',
                indexedAt TEXT NOT NULL,
                chunkCount INTEGER NOT NULL DEFAULT 0
            );

            CREATE TABLE IF NOT EXISTS chunks (
                chunkId INTEGER PRIMARY KEY AUTOINCREMENT,
                path TEXT NOT NULL REFERENCES files(path) ON DELETE CASCADE,
                ordinal INTEGER NOT NULL,
                heading TEXT NOT NULL,
                startLine INTEGER NOT NULL CHECK (startLine >= 1),
                endLine INTEGER NOT NULL,
                text TEXT NOT NULL,
                tokenCount INTEGER NOT NULL,
                CHECK (endLine >= startLine)
            );

            CREATE TABLE IF NOT EXISTS chunk_tags (
                chunkId INTEGER NOT NULL REFERENCES chunks(chunkId) ON DELETE CASCADE,
                tag TEXT NOT NULL,
                PRIMARY KEY (chunkId, tag)
            ) WITHOUT ROWID;

            CREATE TABLE IF NOT EXISTS postings (
                term TEXT NOT NULL,
                chunkId INTEGER NOT NULL REFERENCES chunks(chunkId) ON DELETE CASCADE,
                frequency INTEGER NOT NULL CHECK (frequency > 0),
                PRIMARY KEY (term, chunkId)
            ) WITHOUT ROWID;

            CREATE TABLE IF NOT EXISTS corpus_stats (
                id INTEGER PRIMARY KEY CHECK (id = 1),
                chunkCount INTEGER NOT NULL,
                totalTokens INTEGER NOT NULL
            );

            INSERT OR IGNORE INTO corpus_stats (id, chunkCount, totalTokens) VALUES (1, 0, 0);

            CREATE INDEX IF NOT EXISTS idx_chunks_path ON chunks(path, ordinal);
            CREATE INDEX IF NOT EXISTS idx_chunk_tags_tag ON chunk_tags(tag);
            CREATE INDEX IF NOT EXISTS idx_postings_chunk ON postings(chunkId);
        `);
    }

    private guard<T>(operation: string, action: () => T): T {
        try {
            return action();
        } catch (e) {
            if (e instanceof DocIndexError) {
                throw e;
            }
            throw new StoreError(operation, { cause: e });
        }
    }
}

export function deleteDatabase(filePath: string): void {
    for (const suffix of ["", "-shm", "-wal"]) {
        fs.rmSync(filePath + suffix, { force: true });
    }
}

export function makeInPlaceholders(count: number): string {
    return new Array<string>(count).fill("?").join(", ");
}

function* batches<T>(items: T[], size: number): IterableIterator<T[]> {
    for (let i = 0; i < items.length; i += size) {
        yield items.slice(i, i + size);
    }
}

function toCorpusStats(counts: CountsRow, fileCount: number): CorpusStats {
    return {
        fileCount,
        chunkCount: counts.chunkCount,
        totalTokens: counts.totalTokens,
        averageChunkLength:
            counts.chunkCount > 0 ? counts.totalTokens / counts.chunkCount : 0,
    };
}

function rowToFile(row: FileRow): FileRecord {
    const file: FileRecord = {
        path: row.path,
        etag: row.etag,
        size: row.size,
        modifiedAt: row.modifiedAt,
        tags: parseTags(row.tags),
        indexedAt: row.indexedAt,
        chunkCount: row.chunkCount,
    };
    if (row.title !== null) file.title = row.title;
    if (row.createdAt !== null) file.createdAt = row.createdAt;
    return file;
}

function parseTags(json: string): string[] {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value)
        ? value.filter((t): t is string => typeof t === "string")
        : [];
}

function attachTags(rows: ChunkRow[], tagRows: ChunkTagRow[]): IndexedChunk[] {
    const tags = new Map<number, string[]>();
    for (const { chunkId, tag } of tagRows) {
        const list = tags.get(chunkId);
        if (list) {
            list.push(tag);
        } else {
            tags.set(chunkId, [tag]);
        }
    }
    return rows.map((row) => {
        const chunk: IndexedChunk = {
            chunkId: row.chunkId,
            path: row.path,
            ordinal: row.ordinal,
            heading: row.heading,
            startLine: row.startLine,
            endLine: row.endLine,
            text: row.text,
            tokenCount: row.tokenCount,
            tags: tags.get(row.chunkId) ?? [],
            modifiedAt: row.modifiedAt,
        };
        if (row.title !== null) chunk.title = row.title;
        if (row.createdAt !== null) chunk.createdAt = row.createdAt;
        return chunk;
    });
}
