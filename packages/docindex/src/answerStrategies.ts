// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { PromptSection, TypeChatLanguageModel } from "typechat";
import { isHeadingLine, splitLines } from "./documentParser.js";
import { tokenize } from "./tokenizer.js";
import { RankedChunk } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:answer");

export const MAX_EXTRACTIVE_LINES = 5;
/** Default character budget for the evidence block in the prompt */
export const DEFAULT_CHAR_BUDGET = 12_000;

export interface AnswerRequest {
    question: string;
    /** Distinct query terms of the question */
    terms: string[];
    /** Ranked evidence, best first */
    evidence: RankedChunk[];
}

/**
 * Lines with [n] markers that point into cited (1-based).
 */
export interface StrategyAnswer {
    lines: string[];
    cited: RankedChunk[];
}

export interface AnswerStrategy {
    readonly name: string;
    synthesize(request: AnswerRequest): Promise<StrategyAnswer>;
}

type Sentence = {
    text: string;
    overlap: number;
    rank: number;
    position: number;
};

/**
 * Picks the evidence sentences that share the most words with the question.
 * Needs no backend and never fails.
 */
export class ExtractiveAnswerStrategy implements AnswerStrategy {
    public readonly name = "extractive";

    constructor(public readonly maxLines: number = MAX_EXTRACTIVE_LINES) {}

    public async synthesize(request: AnswerRequest): Promise<StrategyAnswer> {
        const { evidence } = request;
        if (evidence.length === 0) {
            return { lines: [], cited: [] };
        }
        const questionTerms = new Set(request.terms);
        const sentences: Sentence[] = [];
        evidence.forEach((ranked, rank) => {
            splitSentences(ranked.chunk.text).forEach((text, position) => {
                const overlap = new Set(
                    tokenize(text).filter((token) => questionTerms.has(token)),
                ).size;
                if (overlap > 0) {
                    sentences.push({ text, overlap, rank, position });
                }
            });
        });
        sentences.sort(
            (a, b) =>
                b.overlap - a.overlap ||
                a.rank - b.rank ||
                a.position - b.position,
        );

        const lines: string[] = [];
        const cited: RankedChunk[] = [];
        const citedIndex = new Map<number, number>();
        const seen = new Set<string>();
        for (const sentence of sentences) {
            if (lines.length >= this.maxLines) {
                break;
            }
            const key = sentence.text.toLowerCase();
            if (seen.has(key)) {
                continue;
            }
            seen.add(key);
            let n = citedIndex.get(sentence.rank);
            if (n === undefined) {
                cited.push(evidence[sentence.rank]);
                n = cited.length;
                citedIndex.set(sentence.rank, n);
            }
            lines.push(`- ${sentence.text} [${n}]`);
        }

        if (lines.length === 0) {
            const top = evidence[0];
            return { lines: [`- ${top.snippet} [1]`], cited: [top] };
        }
        return { lines, cited };
    }
}

/**
 * Body text of a chunk split into sentences. Heading lines and fenced code are
 * left out; list items and blockquote lines start their own paragraph.
 */
export function splitSentences(text: string): string[] {
    const paragraphs: string[] = [];
    let current: string[] = [];
    const flush = () => {
        if (current.length > 0) {
            paragraphs.push(current.join(" "));
            current = [];
        }
    };

    let inFence = false;
    for (const line of splitLines(text)) {
        const trimmed = line.trim();
        if (/^(```|~~~)/.test(trimmed)) {
            inFence = !inFence;
            flush();
            continue;
        }
        if (inFence || isHeadingLine(line)) {
            flush();
            continue;
        }
        if (!trimmed) {
            flush();
            continue;
        }
        const item = /^(?:[-*+>]|\d+[.)])\s+(.*)$/.exec(trimmed);
        if (item) {
            flush();
            current.push(item[1]);
        } else {
            current.push(trimmed);
        }
    }
    flush();

    const sentences: string[] = [];
    for (const paragraph of paragraphs) {
        for (const sentence of paragraph.split(/(?<=[.!?])\s+/)) {
            const clean = sentence.replace(/\s+/g, " ").trim();
            if (clean) {
                sentences.push(clean);
            }
        }
    }
    return sentences;
}

const ANSWER_SYSTEM_PROMPT = `You answer questions using only the numbered evidence provided.
Reply with at most 5 short bullet lines, each starting with "- ".
End every line with the number of the evidence it is based on, in square brackets, for example [2].
Do not use any knowledge that is not in the evidence. If the evidence does not answer the question, reply with nothing.`;

/**
 * Asks a language model to summarize the evidence, keeping only lines that
 * cite evidence it was shown.
 */
export class LanguageModelAnswerStrategy implements AnswerStrategy {
    public readonly name = "model";

    constructor(
        private model: TypeChatLanguageModel,
        public readonly charBudget: number = DEFAULT_CHAR_BUDGET,
    ) {}

    public async synthesize(request: AnswerRequest): Promise<StrategyAnswer> {
        const packed = packEvidence(request.evidence, this.charBudget);
        if (packed.length === 0) {
            return { lines: [], cited: [] };
        }
        const evidence = packed
            .map(
                ({ chunk }, i) =>
                    `[${i + 1}] ${citationRef(chunk.path, chunk.heading)}\n${chunk.text}`,
            )
            .join("\n---\n");
        const messages: PromptSection[] = [
            { role: "system", content: ANSWER_SYSTEM_PROMPT },
            {
                role: "user",
                content: `<evidence>\n${evidence}\n</evidence>\n\nQuestion: "${request.question}"`,
            },
        ];
        debug(
            "Asking model: %d evidence chunks, %d chars",
            packed.length,
            evidence.length,
        );
        const result = await this.model.complete(messages);
        if (!result.success) {
            throw new Error(result.message);
        }
        const answer = parseCitedLines(result.data, packed);
        if (answer.lines.length === 0) {
            throw new Error("Model response contained no cited lines");
        }
        return answer;
    }
}

/**
 * Evidence in rank order until the budget is used up; the first chunk is
 * always included.
 */
export function packEvidence(
    evidence: RankedChunk[],
    charBudget: number,
): RankedChunk[] {
    const packed: RankedChunk[] = [];
    let charsUsed = 0;
    for (const ranked of evidence) {
        const size = ranked.chunk.text.length;
        if (charsUsed + size > charBudget && packed.length > 0) {
            break;
        }
        packed.push(ranked);
        charsUsed += size;
    }
    return packed;
}

/**
 * Keep response lines that cite at least one valid evidence number.
 * Invalid markers are removed and the valid ones renumbered in order of first
 * use, so [n] always points into the returned cited list.
 */
export function parseCitedLines(
    response: string,
    evidence: RankedChunk[],
): StrategyAnswer {
    const lines: string[] = [];
    const cited: RankedChunk[] = [];
    const renumbered = new Map<number, number>();
    for (const rawLine of response.split(/\r?\n/)) {
        const body = rawLine
            .trim()
            .replace(/^(?:[-*•]|\d+[.)])\s*/, "")
            .trim();
        const refs = [...body.matchAll(/\[(\d+)\]/g)].map((m) => Number(m[1]));
        if (!refs.some((ref) => ref >= 1 && ref <= evidence.length)) {
            continue;
        }
        const text = body
            .replace(/\[(\d+)\]/g, (_, digits: string) => {
                const ref = Number(digits);
                if (ref < 1 || ref > evidence.length) {
                    return "";
                }
                let n = renumbered.get(ref);
                if (n === undefined) {
                    cited.push(evidence[ref - 1]);
                    n = cited.length;
                    renumbered.set(ref, n);
                }
                return `[${n}]`;
            })
            .replace(/\s{2,}/g, " ")
            .trim();
        lines.push(`- ${text}`);
    }
    return { lines, cited };
}

export function citationRef(path: string, heading: string): string {
    return heading ? `${path}#${heading}` : path;
}
