// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    AnswerRequest,
    AnswerStrategy,
    ExtractiveAnswerStrategy,
    StrategyAnswer,
    citationRef,
} from "./answerStrategies.js";
import { BackendTimeoutError, describeError } from "./errors.js";
import { resolveLimit } from "./filters.js";
import { QueryEngine } from "./queryEngine.js";
import { SearchFilters } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:answer");

export const DEFAULT_TOP_K = 6;
export const DEFAULT_ANSWER_TIMEOUT_MS = 15_000;
const MAX_RELATED = 3;

export interface AnswerOptions extends SearchFilters {
    /** Evidence chunks handed to the strategy */
    topK?: number | undefined;
}

export interface Citation {
    /** path#heading, or just the path for a preamble chunk */
    ref: string;
    path: string;
    heading: string;
    startLine: number;
}

export interface AnswerResult {
    question: string;
    /** "- text [n]" lines; n is the 1-based index into citations */
    lines: string[];
    citations: Citation[];
    /** Distinct paths of the top results */
    related: string[];
    /** Name of the strategy that produced the lines */
    strategy: string;
    /** The configured strategy failed and extractive lines were used */
    degraded: boolean;
    generatedAt: string;
}

/**
 * Answers a question from the top search results.
 * The configured strategy runs under a timeout; if it fails or times out the
 * answer is built extractively and marked degraded.
 */
export class AnswerSynthesizer {
    private extractive = new ExtractiveAnswerStrategy();

    constructor(
        private engine: QueryEngine,
        private strategy: AnswerStrategy | undefined = undefined,
        public readonly timeoutMs: number = DEFAULT_ANSWER_TIMEOUT_MS,
    ) {}

    public get strategyName(): string {
        return this.strategy?.name ?? this.extractive.name;
    }

    public async answer(
        question: string,
        options: AnswerOptions = {},
        now: Date = new Date(),
    ): Promise<AnswerResult> {
        const topK = resolveLimit(options.topK, DEFAULT_TOP_K);
        const ranked = this.engine.rank(
            question,
            { ...options, sort: "score", limit: topK },
            now,
        );
        // A question without usable words has no evidence
        const request: AnswerRequest = {
            question,
            terms: ranked.terms,
            evidence: ranked.fellBack ? [] : ranked.ranked,
        };

        let answer: StrategyAnswer | undefined;
        let strategy: string = this.extractive.name;
        let degraded = false;
        if (
            request.evidence.length > 0 &&
            this.strategy !== undefined &&
            this.strategy.name !== this.extractive.name
        ) {
            try {
                answer = await withTimeout(
                    this.strategy.synthesize(request),
                    this.timeoutMs,
                );
                strategy = this.strategy.name;
            } catch (e) {
                debug(
                    "Strategy '%s' failed, answering extractively: %s",
                    this.strategy.name,
                    describeError(e),
                );
                degraded = true;
            }
        }
        answer ??= await this.extractive.synthesize(request);

        const related: string[] = [];
        for (const { chunk } of request.evidence) {
            if (related.length >= MAX_RELATED) {
                break;
            }
            if (!related.includes(chunk.path)) {
                related.push(chunk.path);
            }
        }
        debug(
            "Answered '%s' with %d lines from %d chunks (%s%s)",
            question,
            answer.lines.length,
            request.evidence.length,
            strategy,
            degraded ? ", degraded" : "",
        );
        return {
            question,
            lines: answer.lines,
            citations: answer.cited.map(({ chunk }) => ({
                ref: citationRef(chunk.path, chunk.heading),
                path: chunk.path,
                heading: chunk.heading,
                startLine: chunk.startLine,
            })),
            related,
            strategy,
            degraded,
            generatedAt: now.toISOString(),
        };
    }
}

/**
 * Reject with BackendTimeoutError if the promise does not settle in time.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
            () => reject(new BackendTimeoutError(timeoutMs)),
            timeoutMs,
        );
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
