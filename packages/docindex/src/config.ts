// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import dotenv from "dotenv";
import { DEFAULT_ANSWER_TIMEOUT_MS } from "./answerSynthesizer.js";
import { DEFAULT_BM25, Bm25Settings } from "./queryEngine.js";
import {
    DEFAULT_EXTENSIONS,
    DEFAULT_SYNC_CONCURRENCY,
} from "./synchronizer.js";

export type SourceKind = "local" | "s3";

/**
 * auto: use a language model when OpenAI or Azure OpenAI settings are present
 */
export type AnswerBackend = "auto" | "model" | "extractive";

export interface DocIndexConfig {
    dbPath: string;
    source: SourceKind;
    s3Bucket?: string | undefined;
    s3Region?: string | undefined;
    localRoot: string;
    prefix: string;
    extensions: string[];
    syncConcurrency: number;
    /** 0 disables scheduled syncs */
    syncIntervalMs: number;
    bm25: Bm25Settings;
    answerTimeoutMs: number;
    answerBackend: AnswerBackend;
    port: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Load a .env file into process.env. Variables already set win.
 */
export function loadEnvFile(path?: string): void {
    const result = dotenv.config(path ? { path } : undefined);
    if (result.error && path) {
        throw new Error(`Could not load ${path}: ${result.error.message}`);
    }
}

/**
 * Build the configuration from environment variables.
 * Throws for invalid values, naming the variable.
 */
export function loadConfig(env: Env = process.env): DocIndexConfig {
    const source = getEnum(env, "DOCINDEX_SOURCE", ["local", "s3"], "local");
    const config: DocIndexConfig = {
        dbPath: getString(env, "DOCINDEX_DB_PATH", "./data/docindex.db"),
        source,
        s3Bucket: env["DOCINDEX_S3_BUCKET"] || undefined,
        s3Region: env["DOCINDEX_S3_REGION"] || undefined,
        localRoot: getString(env, "DOCINDEX_LOCAL_ROOT", "./notes"),
        prefix: env["DOCINDEX_PREFIX"] ?? "",
        extensions: getList(env, "DOCINDEX_EXTENSIONS", DEFAULT_EXTENSIONS).map(
            (ext) => (ext.startsWith(".") ? ext : "." + ext).toLowerCase(),
        ),
        syncConcurrency: getInt(
            env,
            "DOCINDEX_SYNC_CONCURRENCY",
            DEFAULT_SYNC_CONCURRENCY,
            1,
        ),
        syncIntervalMs: getInt(env, "DOCINDEX_SYNC_INTERVAL_MS", 0, 0),
        bm25: {
            k1: getNumber(env, "DOCINDEX_BM25_K1", DEFAULT_BM25.k1),
            b: getNumber(env, "DOCINDEX_BM25_B", DEFAULT_BM25.b),
        },
        answerTimeoutMs: getInt(
            env,
            "DOCINDEX_ANSWER_TIMEOUT_MS",
            DEFAULT_ANSWER_TIMEOUT_MS,
            1,
        ),
        answerBackend: getEnum(
            env,
            "DOCINDEX_ANSWER_BACKEND",
            ["auto", "model", "extractive"],
            "auto",
        ),
        port: getInt(env, "PORT", 8000, 1),
    };
    if (config.bm25.b < 0 || config.bm25.b > 1) {
        throw new Error(
            `Invalid value for DOCINDEX_BM25_B: ${config.bm25.b} (expected 0..1)`,
        );
    }
    if (config.source === "s3" && !config.s3Bucket) {
        throw new Error("DOCINDEX_S3_BUCKET not set");
    }
    return config;
}

/**
 * True when the environment carries settings typechat can build a model from.
 */
export function hasLanguageModelSettings(env: Env = process.env): boolean {
    return !!(env["OPENAI_API_KEY"] || env["AZURE_OPENAI_API_KEY"]);
}

function getString(env: Env, key: string, defaultValue: string): string {
    const value = env[key]?.trim();
    return value ? value : defaultValue;
}

function getList(env: Env, key: string, defaultValue: string[]): string[] {
    const value = env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    return value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

function getInt(
    env: Env,
    key: string,
    defaultValue: number,
    min: number,
): number {
    const value = env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const num = Number(value);
    if (!Number.isInteger(num) || num < min) {
        throw new Error(`Invalid value for ${key}: ${value}`);
    }
    return num;
}

function getNumber(env: Env, key: string, defaultValue: number): number {
    const value = env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const num = Number(value);
    if (!Number.isFinite(num) || num < 0) {
        throw new Error(`Invalid value for ${key}: ${value}`);
    }
    return num;
}

function getEnum<T extends string>(
    env: Env,
    key: string,
    allowed: readonly T[],
    defaultValue: T,
): T {
    const value = env[key]?.trim().toLowerCase();
    if (!value) {
        return defaultValue;
    }
    const match = allowed.find((item) => item === value);
    if (match === undefined) {
        throw new Error(
            `Invalid value for ${key}: ${value} (expected ${allowed.join(", ")})`,
        );
    }
    return match;
}
