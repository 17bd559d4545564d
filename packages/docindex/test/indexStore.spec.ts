// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { StoreError } from "../src/errors.js";
import { IndexStore } from "../src/indexStore.js";
import { termFrequencies } from "../src/tokenizer.js";
import { DocumentChunk } from "../src/types.js";
import {
    createTestStore,
    ensureTestDir,
    indexDocument,
    testFilePath,
} from "./testCommon.js";

const colors = "# Alpha\nred green red\n# Beta\nblue";

describe("docindex.indexStore", () => {
    let store: IndexStore;
    beforeEach(() => {
        store = createTestStore();
    });
    afterEach(() => {
        store.close();
    });

    test("upsertFile", () => {
        const result = indexDocument(
            store,
            "colors.md",
            "---\ntitle: Colors\ndate: 2024-02-01\ntags: [art]\n---\n" + colors,
            "2024-02-02T00:00:00.000Z",
            "etag-7",
        );
        expect(result).toEqual({
            path: "colors.md",
            replaced: false,
            chunkCount: 2,
            removedChunkCount: 0,
        });
        expect(store.getEtag("colors.md")).toBe("etag-7");
        expect(store.getEtag("missing.md")).toBeUndefined();

        const file = store.getFile("colors.md");
        expect(file).toMatchObject({
            path: "colors.md",
            etag: "etag-7",
            title: "Colors",
            createdAt: "2024-02-01T00:00:00.000Z",
            modifiedAt: "2024-02-02T00:00:00.000Z",
            tags: ["art"],
            chunkCount: 2,
        });

        const chunks = store.getChunks("colors.md");
        expect(
            chunks.map((c) => [c.ordinal, c.heading, c.startLine, c.endLine]),
        ).toEqual([
            [0, "Alpha", 6, 7],
            [1, "Beta", 8, 9],
        ]);
        expect(chunks[0].tags).toEqual(["art"]);
        expect(chunks[0].title).toBe("Colors");
    });

    test("corpusStats", () => {
        indexDocument(store, "colors.md", colors);
        expect(store.getCorpusStats()).toEqual({
            fileCount: 1,
            chunkCount: 2,
            totalTokens: 6,
            averageChunkLength: 3,
        });
        indexDocument(store, "more.md", "one two three four five six");
        const stats = store.getCorpusStats();
        expect(stats).toEqual({
            fileCount: 2,
            chunkCount: 3,
            totalTokens: 12,
            averageChunkLength: 4,
        });
        expect(store.recomputeCorpusStats()).toEqual(stats);
    });

    test("postingsMatchText", () => {
        indexDocument(store, "colors.md", colors);
        const chunks = store.getChunks("colors.md");
        expect(store.getPostings(chunks[0].chunkId)).toEqual([
            { term: "alpha", chunkId: chunks[0].chunkId, frequency: 1 },
            { term: "green", chunkId: chunks[0].chunkId, frequency: 1 },
            { term: "red", chunkId: chunks[0].chunkId, frequency: 2 },
        ]);
        for (const chunk of chunks) {
            const expected = [...termFrequencies(chunk.text)]
                .sort(([a], [b]) => (a < b ? -1 : 1))
                .map(([term, frequency]) => ({
                    term,
                    chunkId: chunk.chunkId,
                    frequency,
                }));
            expect(store.getPostings(chunk.chunkId)).toEqual(expected);
        }
    });

    test("replaceFile", () => {
        indexDocument(store, "colors.md", colors);
        const oldChunks = store.getChunks("colors.md");
        const result = indexDocument(
            store,
            "colors.md",
            "# Gamma\npurple",
            "2024-03-01T00:00:00.000Z",
            "etag-2",
        );
        expect(result).toEqual({
            path: "colors.md",
            replaced: true,
            chunkCount: 1,
            removedChunkCount: 2,
        });
        for (const chunk of oldChunks) {
            expect(store.getPostings(chunk.chunkId)).toEqual([]);
        }
        expect(store.candidatesForTerms(["red", "blue"])).toEqual([]);
        expect(store.getChunks("colors.md").map((c) => c.heading)).toEqual([
            "Gamma",
        ]);
        expect(store.getCorpusStats()).toEqual(store.recomputeCorpusStats());
        expect(store.getCorpusStats().totalTokens).toBe(2);
    });

    test("deleteFile", () => {
        indexDocument(store, "colors.md", colors);
        indexDocument(store, "other.md", "red wine");
        expect(store.deleteFile("colors.md")).toBe(true);
        expect(store.deleteFile("colors.md")).toBe(false);
        expect(store.getEtag("colors.md")).toBeUndefined();
        expect(store.getChunks("colors.md")).toEqual([]);

        const candidates = store.candidatesForTerms(["red", "blue"]);
        expect(candidates.map((c) => c.chunk.path)).toEqual(["other.md"]);
        expect(store.getCorpusStats()).toEqual({
            fileCount: 1,
            chunkCount: 1,
            totalTokens: 2,
            averageChunkLength: 2,
        });
    });

    test("candidatesForTerms", () => {
        indexDocument(store, "colors.md", colors);
        const candidates = store.candidatesForTerms(["red", "blue", "nothing"]);
        expect(
            candidates.map((c) => [
                c.chunk.heading,
                Object.fromEntries(c.termFrequencies),
            ]),
        ).toEqual([
            ["Alpha", { red: 2 }],
            ["Beta", { blue: 1 }],
        ]);
        expect(store.candidatesForTerms([])).toEqual([]);
    });

    test("listByPrefix", () => {
        indexDocument(store, "notes/a.md", "alpha");
        indexDocument(store, "notes/b.md", "beta");
        indexDocument(store, "journal/c.md", "gamma");
        expect(store.listPaths()).toEqual([
            "journal/c.md",
            "notes/a.md",
            "notes/b.md",
        ]);
        expect(store.listPaths("notes/")).toEqual(["notes/a.md", "notes/b.md"]);
        expect(store.listChunks("journal/").map((c) => c.text)).toEqual([
            "gamma",
        ]);
        expect(store.listFiles("nowhere/")).toEqual([]);
    });

    test("atomicUpsert", () => {
        indexDocument(store, "colors.md", colors);
        const before = store.getChunks("colors.md");
        const stats = store.getCorpusStats();
        const broken: DocumentChunk[] = [
            {
                ordinal: 0,
                heading: "Fine",
                startLine: 1,
                endLine: 1,
                text: "fine words",
                tokenCount: 2,
                tags: [],
            },
            {
                ordinal: 1,
                heading: "Broken",
                startLine: 0,
                endLine: 1,
                text: "broken words",
                tokenCount: 2,
                tags: [],
            },
        ];
        expect(() =>
            store.upsertFile(
                {
                    path: "colors.md",
                    etag: "etag-broken",
                    modifiedAt: "2024-05-01T00:00:00.000Z",
                    size: 10,
                    frontMatter: { tags: [] },
                },
                broken,
            ),
        ).toThrow(StoreError);
        expect(store.getEtag("colors.md")).toBe("etag-1");
        expect(store.getChunks("colors.md")).toEqual(before);
        expect(store.getCorpusStats()).toEqual(stats);
        expect(store.candidatesForTerms(["fine"])).toEqual([]);
    });

    test("closedStore", () => {
        store.close();
        expect(store.isOpen).toBe(false);
        expect(() => store.getEtag("colors.md")).toThrow(StoreError);
        try {
            store.listPaths();
        } catch (e) {
            expect(e).toBeInstanceOf(StoreError);
            expect(e instanceof StoreError && e.operation).toBe("listFiles");
        }
    });

    test("snapshot", () => {
        indexDocument(store, "colors.md", colors);
        const [stats, candidates] = store.snapshot(
            () =>
                [
                    store.getCorpusStats(),
                    store.candidatesForTerms(["blue"]),
                ] as const,
        );
        expect(stats.chunkCount).toBe(2);
        expect(candidates).toHaveLength(1);
    });
});

describe("docindex.indexStore.file", () => {
    test("reopen", () => {
        ensureTestDir();
        const dbPath = testFilePath("reopen.db");
        let store = IndexStore.open(dbPath, true);
        indexDocument(store, "colors.md", colors, undefined, "etag-9");
        store.close();

        store = IndexStore.open(dbPath);
        try {
            expect(store.getEtag("colors.md")).toBe("etag-9");
            expect(store.getCorpusStats().chunkCount).toBe(2);
        } finally {
            store.close();
        }
    });
});
