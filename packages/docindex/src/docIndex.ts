// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createLanguageModel } from "typechat";
import {
    AnswerOptions,
    AnswerResult,
    AnswerSynthesizer,
} from "./answerSynthesizer.js";
import {
    AnswerStrategy,
    LanguageModelAnswerStrategy,
} from "./answerStrategies.js";
import {
    BlobSource,
    LocalFolderBlobSource,
    S3BlobSource,
} from "./blobSource.js";
import { DocIndexConfig, Env, hasLanguageModelSettings } from "./config.js";
import { FacetAggregator, FacetOptions, FacetResult } from "./facets.js";
import { IndexStore } from "./indexStore.js";
import { QueryEngine } from "./queryEngine.js";
import {
    SyncOptions,
    SyncReport,
    SyncScheduler,
    SyncSchedulerCallbacks,
    Synchronizer,
} from "./synchronizer.js";
import { CorpusStats, SearchOptions, SearchResponse } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:index");

/**
 * One index with everything that reads and writes it.
 */
export class DocIndex {
    public readonly queryEngine: QueryEngine;
    public readonly facetAggregator: FacetAggregator;
    public readonly answerSynthesizer: AnswerSynthesizer;
    public readonly synchronizer: Synchronizer;
    private scheduler: SyncScheduler | undefined;

    constructor(
        public readonly store: IndexStore,
        source: BlobSource,
        public readonly config: DocIndexConfig,
        answerStrategy?: AnswerStrategy | undefined,
    ) {
        this.queryEngine = new QueryEngine(store, config.bm25);
        this.facetAggregator = new FacetAggregator(store);
        this.answerSynthesizer = new AnswerSynthesizer(
            this.queryEngine,
            answerStrategy,
            config.answerTimeoutMs,
        );
        this.synchronizer = new Synchronizer(store, source, {
            prefix: config.prefix,
            extensions: config.extensions,
            concurrency: config.syncConcurrency,
        });
    }

    public search(query: string, options?: SearchOptions): SearchResponse {
        return this.queryEngine.search(query, options);
    }

    public answer(
        question: string,
        options?: AnswerOptions,
    ): Promise<AnswerResult> {
        return this.answerSynthesizer.answer(question, options);
    }

    public facets(options?: FacetOptions): FacetResult {
        return this.facetAggregator.facets(options);
    }

    public sync(options?: SyncOptions): Promise<SyncReport> {
        return this.synchronizer.sync(options);
    }

    public stats(): CorpusStats {
        return this.store.getCorpusStats();
    }

    /**
     * Start periodic syncs when the configured interval is non-zero.
     */
    public startScheduler(callbacks?: SyncSchedulerCallbacks): boolean {
        if (this.config.syncIntervalMs <= 0 || this.scheduler) {
            return false;
        }
        this.scheduler = new SyncScheduler(
            this.synchronizer,
            this.config.syncIntervalMs,
            callbacks,
        );
        this.scheduler.start();
        return true;
    }

    public async close(): Promise<void> {
        if (this.scheduler) {
            await this.scheduler.stop();
            this.scheduler = undefined;
        }
        this.store.close();
    }
}

/**
 * Open the store, the blob source and the answer backend named by config.
 */
export function createDocIndex(
    config: DocIndexConfig,
    env: Env = process.env,
): DocIndex {
    const store = IndexStore.open(config.dbPath);
    try {
        return new DocIndex(
            store,
            createBlobSource(config),
            config,
            createAnswerStrategy(config, env),
        );
    } catch (e) {
        store.close();
        throw e;
    }
}

export function createBlobSource(config: DocIndexConfig): BlobSource {
    if (config.source === "s3") {
        if (!config.s3Bucket) {
            throw new Error("DOCINDEX_S3_BUCKET not set");
        }
        return new S3BlobSource({
            bucket: config.s3Bucket,
            region: config.s3Region,
        });
    }
    return new LocalFolderBlobSource(config.localRoot);
}

/**
 * The configured summarization strategy; undefined means extractive only.
 */
export function createAnswerStrategy(
    config: DocIndexConfig,
    env: Env = process.env,
): AnswerStrategy | undefined {
    switch (config.answerBackend) {
        case "extractive":
            return undefined;
        case "auto":
            if (!hasLanguageModelSettings(env)) {
                debug("No language model settings: answers are extractive");
                return undefined;
            }
            break;
        default:
            break;
    }
    return new LanguageModelAnswerStrategy(createLanguageModel(env));
}
