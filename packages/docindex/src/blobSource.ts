// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    GetObjectCommand,
    ListObjectsV2Command,
    ListObjectsV2CommandOutput,
    S3Client,
} from "@aws-sdk/client-s3";
import fs from "node:fs";
import path from "node:path";
import { SourceUnavailableError, describeError } from "./errors.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:sync");

/**
 * An object as reported by a listing.
 */
export interface BlobObject {
    /** Object key; also the document path in the index */
    path: string;
    /** Opaque change token */
    etag: string;
    modifiedAt: Date;
    size: number;
}

/**
 * Read-only view of the object store documents come from.
 * Implementations throw SourceUnavailableError on failure.
 */
export interface BlobSource {
    readonly name: string;
    list(prefix: string): Promise<BlobObject[]>;
    fetch(path: string): Promise<string>;
}

export type S3BlobSourceSettings = {
    bucket: string;
    region?: string | undefined;
    /** Preconfigured client; one is created for region otherwise */
    client?: S3Client | undefined;
};

export class S3BlobSource implements BlobSource {
    private s3Client: S3Client;
    private bucketName: string;

    constructor(settings: S3BlobSourceSettings) {
        this.bucketName = settings.bucket;
        this.s3Client =
            settings.client ?? new S3Client({ region: settings.region });
    }

    public get name(): string {
        return `s3://${this.bucketName}`;
    }

    public async list(prefix: string): Promise<BlobObject[]> {
        const results: BlobObject[] = [];
        let continuationToken: string | undefined = undefined;
        do {
            const command: ListObjectsV2Command = new ListObjectsV2Command({
                Bucket: this.bucketName,
                Prefix: prefix || undefined,
                ContinuationToken: continuationToken,
            });
            let response: ListObjectsV2CommandOutput;
            try {
                response = await this.s3Client.send(command);
            } catch (e) {
                throw new SourceUnavailableError(
                    `Could not list ${this.name}/${prefix}: ${describeError(e)}`,
                    undefined,
                    { cause: e },
                );
            }
            for (const content of response.Contents ?? []) {
                if (content.Key && !content.Key.endsWith("/")) {
                    results.push({
                        path: content.Key,
                        etag: stripQuotes(content.ETag ?? ""),
                        modifiedAt: content.LastModified ?? new Date(0),
                        size: content.Size ?? 0,
                    });
                }
            }
            continuationToken = response.IsTruncated
                ? response.NextContinuationToken
                : undefined;
        } while (continuationToken);

        debug("Listed %d objects in %s", results.length, this.name);
        return results;
    }

    public async fetch(key: string): Promise<string> {
        try {
            const response = await this.s3Client.send(
                new GetObjectCommand({
                    Bucket: this.bucketName,
                    Key: key,
                }),
            );
            if (!response.Body) {
                throw new Error("empty response body");
            }
            return await response.Body.transformToString("utf-8");
        } catch (e) {
            throw new SourceUnavailableError(
                `Could not fetch ${this.name}/${key}: ${describeError(e)}`,
                key,
                { cause: e },
            );
        }
    }
}

/**
 * Documents in a local directory tree. Paths are relative to the root and
 * always use forward slashes.
 */
export class LocalFolderBlobSource implements BlobSource {
    private rootPath: string;

    constructor(rootPath: string) {
        this.rootPath = path.resolve(rootPath);
    }

    public get name(): string {
        return this.rootPath;
    }

    public async list(prefix: string): Promise<BlobObject[]> {
        const results: BlobObject[] = [];
        try {
            await this.walk(this.rootPath, results);
        } catch (e) {
            throw new SourceUnavailableError(
                `Could not list ${this.rootPath}: ${describeError(e)}`,
                undefined,
                { cause: e },
            );
        }
        const listed = results
            .filter((blob) => blob.path.startsWith(prefix))
            .sort((a, b) => a.path.localeCompare(b.path));
        debug("Listed %d files in %s", listed.length, this.rootPath);
        return listed;
    }

    public async fetch(blobPath: string): Promise<string> {
        const fullPath = path.resolve(this.rootPath, blobPath);
        const relative = path.relative(this.rootPath, fullPath);
        if (
            !relative ||
            relative === ".." ||
            relative.startsWith(".." + path.sep) ||
            path.isAbsolute(relative)
        ) {
            throw new SourceUnavailableError(
                `Path ${blobPath} is outside ${this.rootPath}`,
                blobPath,
            );
        }
        try {
            return await fs.promises.readFile(fullPath, "utf-8");
        } catch (e) {
            throw new SourceUnavailableError(
                `Could not read ${fullPath}: ${describeError(e)}`,
                blobPath,
                { cause: e },
            );
        }
    }

    private async walk(dirPath: string, results: BlobObject[]): Promise<void> {
        const entries = await fs.promises.readdir(dirPath, {
            withFileTypes: true,
        });
        for (const entry of entries) {
            const fullPath = path.join(dirPath, entry.name);
            if (entry.isDirectory()) {
                await this.walk(fullPath, results);
            } else if (entry.isFile()) {
                const stats = await fs.promises.stat(fullPath);
                results.push({
                    path: path
                        .relative(this.rootPath, fullPath)
                        .split(path.sep)
                        .join("/"),
                    etag: `${stats.size}-${Math.floor(stats.mtimeMs)}`,
                    modifiedAt: stats.mtime,
                    size: stats.size,
                });
            }
        }
    }
}

function stripQuotes(etag: string): string {
    return etag.replace(/^"|"$/g, "");
}
