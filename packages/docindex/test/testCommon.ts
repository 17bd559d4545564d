// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { BlobObject, BlobSource } from "../src/blobSource.js";
import { parseDocument } from "../src/documentParser.js";
import { SourceUnavailableError } from "../src/errors.js";
import { IndexStore } from "../src/indexStore.js";
import { UpsertResult } from "../src/types.js";

export function getRootDataPath(): string {
    return path.join(os.tmpdir(), "data", "tests", "docindex");
}

export function ensureTestDir(): string {
    const dirPath = getRootDataPath();
    fs.mkdirSync(dirPath, { recursive: true });
    return dirPath;
}

export function testFilePath(fileName: string): string {
    return path.join(getRootDataPath(), fileName);
}

export function createTestStore(): IndexStore {
    return IndexStore.open(":memory:");
}

/**
 * Parse and store a document the way the synchronizer would.
 */
export function indexDocument(
    store: IndexStore,
    docPath: string,
    raw: string,
    modifiedAt: string = "2024-01-01T00:00:00.000Z",
    etag: string = "etag-1",
): UpsertResult {
    const document = parseDocument(raw, docPath, modifiedAt);
    return store.upsertFile(
        {
            path: docPath,
            etag,
            modifiedAt,
            size: raw.length,
            frontMatter: document.frontMatter,
        },
        document.chunks,
    );
}

export function repeatWords(word: string, count: number): string {
    return new Array<string>(count).fill(word).join(" ");
}

type MemoryBlob = {
    content: string;
    etag: string;
    modifiedAt: Date;
};

/**
 * In-process blob source. Every put gets a new etag.
 */
export class MemoryBlobSource implements BlobSource {
    public readonly name = "memory";
    public failList = false;
    public failFetch = new Set<string>();
    public fetchCount = 0;
    public onFetch: ((path: string) => void) | undefined;
    private blobs = new Map<string, MemoryBlob>();
    private version = 0;

    public put(
        blobPath: string,
        content: string,
        modifiedAt: string = "2024-01-01T00:00:00.000Z",
    ): void {
        this.blobs.set(blobPath, {
            content,
            etag: `v${++this.version}`,
            modifiedAt: new Date(modifiedAt),
        });
    }

    public remove(blobPath: string): void {
        this.blobs.delete(blobPath);
    }

    public async list(prefix: string): Promise<BlobObject[]> {
        if (this.failList) {
            throw new SourceUnavailableError("Listing failed");
        }
        return [...this.blobs]
            .filter(([blobPath]) => blobPath.startsWith(prefix))
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([blobPath, blob]) => ({
                path: blobPath,
                etag: blob.etag,
                modifiedAt: blob.modifiedAt,
                size: blob.content.length,
            }));
    }

    public async fetch(blobPath: string): Promise<string> {
        this.fetchCount++;
        this.onFetch?.(blobPath);
        const blob = this.blobs.get(blobPath);
        if (!blob || this.failFetch.has(blobPath)) {
            throw new SourceUnavailableError(
                `Could not fetch ${blobPath}`,
                blobPath,
            );
        }
        return blob.content;
    }
}
