// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { QueueObject, queue } from "async";
import { BlobObject, BlobSource } from "./blobSource.js";
import { parseDocument } from "./documentParser.js";
import {
    ParseError,
    SourceUnavailableError,
    describeError,
} from "./errors.js";
import { IndexStore } from "./indexStore.js";
import { PathWriteQueue } from "./pathWriteQueue.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:sync");

export const DEFAULT_EXTENSIONS = [".md", ".markdown", ".txt"];
export const DEFAULT_SYNC_CONCURRENCY = 4;

export interface SyncError {
    path: string;
    message: string;
}

/**
 * Outcome of one synchronization run.
 * processed counts units of work that ran (including failed ones);
 * skipped counts units never started because the run was cancelled.
 */
export interface SyncReport {
    added: number;
    updated: number;
    removed: number;
    unchanged: number;
    errors: SyncError[];
    processed: number;
    skipped: number;
    cancelled: boolean;
    startedAt: string;
    elapsedMs: number;
}

export type SynchronizerSettings = {
    /** Only objects whose key starts with this are indexed */
    prefix: string;
    /** Lowercase extensions with the dot; empty accepts every object */
    extensions: string[];
    /** Objects fetched and parsed in parallel */
    concurrency: number;
};

export type SyncOptions = {
    signal?: AbortSignal | undefined;
};

type SyncOutcome = "added" | "updated" | "unchanged";

type SyncRun = () => Promise<void>;

/**
 * Brings the index in line with the blob source: new and changed objects are
 * (re)indexed, vanished ones are removed, unchanged ones are left alone.
 */
export class Synchronizer {
    public readonly settings: SynchronizerSettings;
    // One run at a time: a run deletes whatever its own listing lacks
    private runs: QueueObject<SyncRun> = queue(
        async (run: SyncRun) => run(),
        1,
    );

    constructor(
        public readonly store: IndexStore,
        public readonly source: BlobSource,
        settings?: Partial<SynchronizerSettings>,
        private writeQueue: PathWriteQueue = new PathWriteQueue(),
    ) {
        this.settings = {
            prefix: settings?.prefix ?? "",
            extensions: (settings?.extensions ?? DEFAULT_EXTENSIONS).map((e) =>
                e.toLowerCase(),
            ),
            concurrency: Math.max(
                1,
                settings?.concurrency ?? DEFAULT_SYNC_CONCURRENCY,
            ),
        };
    }

    public isIndexable(path: string): boolean {
        const extensions = this.settings.extensions;
        if (extensions.length === 0) {
            return true;
        }
        const lower = path.toLowerCase();
        return extensions.some((ext) => lower.endsWith(ext));
    }

    /** Runs queued behind the one in progress */
    public get pendingRuns(): number {
        return this.runs.length();
    }

    /**
     * Run one synchronization pass. Passes requested while another is in
     * progress wait for it to finish.
     * Throws SourceUnavailableError when the listing fails and StoreError when
     * the index cannot be written; both abort the run. Documents that cannot be
     * fetched or parsed are reported and skipped.
     */
    public sync(options?: SyncOptions): Promise<SyncReport> {
        return new Promise<SyncReport>((resolve, reject) => {
            this.runs.push(async () => {
                try {
                    resolve(await this.runSync(options));
                } catch (e) {
                    reject(e);
                }
            });
        });
    }

    private async runSync(options?: SyncOptions): Promise<SyncReport> {
        const signal = options?.signal;
        const startTime = performance.now();
        const report: SyncReport = {
            added: 0,
            updated: 0,
            removed: 0,
            unchanged: 0,
            errors: [],
            processed: 0,
            skipped: 0,
            cancelled: false,
            startedAt: new Date().toISOString(),
            elapsedMs: 0,
        };

        const prefix = this.settings.prefix;
        const listing = (await this.source.list(prefix)).filter((blob) =>
            this.isIndexable(blob.path),
        );
        debug(
            "Syncing %d objects from %s (prefix '%s')",
            listing.length,
            this.source.name,
            prefix,
        );

        let fatalError: unknown;
        const shouldSkip = () => fatalError !== undefined || !!signal?.aborted;
        const pool = queue(async (blob: BlobObject) => {
            if (shouldSkip()) {
                report.skipped++;
                return;
            }
            try {
                const outcome = await this.syncObject(blob);
                report[outcome]++;
            } catch (e) {
                if (
                    e instanceof SourceUnavailableError ||
                    e instanceof ParseError
                ) {
                    debug("Skipping %s: %s", blob.path, describeError(e));
                    report.errors.push({
                        path: blob.path,
                        message: describeError(e),
                    });
                } else {
                    fatalError ??= e;
                }
            }
            report.processed++;
        }, this.settings.concurrency);
        await Promise.all(listing.map((blob) => pool.pushAsync(blob)));

        if (fatalError === undefined) {
            const listed = new Set(listing.map((blob) => blob.path));
            for (const path of this.store.listPaths(prefix)) {
                if (listed.has(path)) {
                    continue;
                }
                if (shouldSkip()) {
                    report.skipped++;
                    continue;
                }
                try {
                    const removed = await this.writeQueue.run(path, async () =>
                        this.store.deleteFile(path),
                    );
                    if (removed) {
                        report.removed++;
                    }
                } catch (e) {
                    fatalError = e;
                }
                report.processed++;
            }
        }

        report.cancelled = !!signal?.aborted;
        report.elapsedMs = performance.now() - startTime;
        if (fatalError !== undefined) {
            debug("Sync aborted: %s", describeError(fatalError));
            throw fatalError;
        }
        debug(
            "Sync done in %dms: +%d ~%d -%d =%d, %d errors%s",
            Math.round(report.elapsedMs),
            report.added,
            report.updated,
            report.removed,
            report.unchanged,
            report.errors.length,
            report.cancelled ? " (cancelled)" : "",
        );
        return report;
    }

    private syncObject(blob: BlobObject): Promise<SyncOutcome> {
        return this.writeQueue.run<SyncOutcome>(blob.path, async () => {
            // Compared inside the path lock; another writer may have indexed it
            if (this.store.getEtag(blob.path) === blob.etag) {
                return "unchanged";
            }
            const raw = await this.source.fetch(blob.path);
            const modifiedAt = blob.modifiedAt.toISOString();
            const document = parseDocument(raw, blob.path, modifiedAt);
            const result = this.store.upsertFile(
                {
                    path: blob.path,
                    etag: blob.etag,
                    modifiedAt,
                    size: blob.size,
                    frontMatter: document.frontMatter,
                },
                document.chunks,
            );
            return result.replaced ? "updated" : "added";
        });
    }
}

export type SyncSchedulerCallbacks = {
    onReport?: ((report: SyncReport) => void) | undefined;
    onError?: ((error: unknown) => void) | undefined;
};

/**
 * Re-runs a synchronizer on a fixed interval. A tick that arrives while a run
 * is still in progress is dropped.
 */
export class SyncScheduler {
    private timer: NodeJS.Timeout | undefined;
    private running: Promise<SyncReport | undefined> | undefined;
    private abortController: AbortController | undefined;

    constructor(
        private synchronizer: Synchronizer,
        public readonly intervalMs: number,
        private callbacks: SyncSchedulerCallbacks = {},
    ) {}

    public get isRunning(): boolean {
        return this.running !== undefined;
    }

    public start(): void {
        if (this.timer !== undefined) {
            return;
        }
        this.timer = setInterval(() => {
            this.running ??= this.runNow();
        }, this.intervalMs);
        this.timer.unref();
        debug("Scheduled sync every %dms", this.intervalMs);
    }

    /**
     * Run a pass now unless one is in progress.
     * Resolves to undefined when skipped or failed; failures go to onError.
     */
    public runNow(): Promise<SyncReport | undefined> {
        if (this.running) {
            return Promise.resolve(undefined);
        }
        const controller = new AbortController();
        this.abortController = controller;
        this.running = this.synchronizer
            .sync({ signal: controller.signal })
            .then(
                (report) => {
                    this.callbacks.onReport?.(report);
                    return report;
                },
                (error: unknown) => {
                    if (this.callbacks.onError) {
                        this.callbacks.onError(error);
                    } else {
                        debug(
                            "Scheduled sync failed: %s",
                            describeError(error),
                        );
                    }
                    return undefined;
                },
            )
            .finally(() => {
                this.running = undefined;
                this.abortController = undefined;
            });
        return this.running;
    }

    /**
     * Stop scheduling, cancel the run in progress and wait for it to end.
     */
    public async stop(): Promise<void> {
        if (this.timer !== undefined) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        this.abortController?.abort();
        await this.running;
    }
}
