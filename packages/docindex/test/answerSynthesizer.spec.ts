// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    PromptSection,
    Result,
    TypeChatLanguageModel,
    error,
    success,
} from "typechat";
import {
    LanguageModelAnswerStrategy,
    citationRef,
    packEvidence,
    parseCitedLines,
    splitSentences,
} from "../src/answerStrategies.js";
import { AnswerSynthesizer, withTimeout } from "../src/answerSynthesizer.js";
import { BackendTimeoutError } from "../src/errors.js";
import { IndexStore } from "../src/indexStore.js";
import { QueryEngine } from "../src/queryEngine.js";
import { createTestStore, indexDocument } from "./testCommon.js";

const now = new Date("2024-06-15T12:00:00.000Z");
const question = "Where is the cache directory?";
const extractiveLines = [
    "- Then configure the cache directory. [1]",
    "- The cache directory holds index files. [2]",
    "- The weather is nice. [1]",
    "- Install the package with npm. [1]",
];

class TestModel implements TypeChatLanguageModel {
    public prompts: PromptSection[][] = [];

    constructor(private respond: () => Promise<Result<string>>) {}

    public complete(prompt: string | PromptSection[]): Promise<Result<string>> {
        this.prompts.push(
            typeof prompt === "string"
                ? [{ role: "user", content: prompt }]
                : prompt,
        );
        return this.respond();
    }
}

describe("docindex.answerSynthesizer", () => {
    let store: IndexStore;
    let engine: QueryEngine;
    beforeEach(() => {
        store = createTestStore();
        engine = new QueryEngine(store);
        indexDocument(
            store,
            "guide.md",
            "# Setup\nInstall the package with npm. " +
                "Then configure the cache directory.\nThe weather is nice.",
        );
        indexDocument(
            store,
            "faq.md",
            "# Cache\nThe cache directory holds index files. " +
                "Delete it to rebuild.",
        );
    });
    afterEach(() => {
        store.close();
    });

    test("extractive", async () => {
        const answer = await new AnswerSynthesizer(engine).answer(
            question,
            {},
            now,
        );
        expect(answer).toEqual({
            question,
            lines: extractiveLines,
            citations: [
                {
                    ref: "guide.md#Setup",
                    path: "guide.md",
                    heading: "Setup",
                    startLine: 1,
                },
                {
                    ref: "faq.md#Cache",
                    path: "faq.md",
                    heading: "Cache",
                    startLine: 1,
                },
            ],
            related: ["guide.md", "faq.md"],
            strategy: "extractive",
            degraded: false,
            generatedAt: "2024-06-15T12:00:00.000Z",
        });
    });

    test("extractiveFallsBackToSnippet", async () => {
        const answer = await new AnswerSynthesizer(engine).answer(
            "setup",
            {},
            now,
        );
        expect(answer.lines).toEqual([
            "- # Setup Install the package with npm. " +
                "Then configure the cache directory. The weather is nice. [1]",
        ]);
        expect(answer.citations.map((c) => c.ref)).toEqual(["guide.md#Setup"]);
    });

    test("noEvidence", async () => {
        const synthesizer = new AnswerSynthesizer(engine);
        for (const q of ["zebra", "", "?"]) {
            const answer = await synthesizer.answer(q, {}, now);
            expect(answer.lines).toEqual([]);
            expect(answer.citations).toEqual([]);
            expect(answer.related).toEqual([]);
            expect(answer.degraded).toBe(false);
        }
    });

    test("filtersAndTopK", async () => {
        const synthesizer = new AnswerSynthesizer(engine);
        const onlyFaq = await synthesizer.answer(
            question,
            { pathPrefix: "faq" },
            now,
        );
        expect(onlyFaq.related).toEqual(["faq.md"]);
        expect(onlyFaq.lines).toEqual([
            "- The cache directory holds index files. [1]",
        ]);

        const top1 = await synthesizer.answer(question, { topK: 1 }, now);
        expect(top1.related).toEqual(["guide.md"]);
        await expect(
            synthesizer.answer(question, { topK: 0 }, now),
        ).rejects.toThrow("Invalid limit");
    });

    test("modelAnswer", async () => {
        const model = new TestModel(async () =>
            success(
                [
                    "- The cache lives in the cache directory [2]",
                    "- Unsupported claim [7]",
                    "Some chatter",
                    "- Install with npm [1]",
                ].join("\n"),
            ),
        );
        const synthesizer = new AnswerSynthesizer(
            engine,
            new LanguageModelAnswerStrategy(model),
        );
        const answer = await synthesizer.answer(question, {}, now);
        expect(answer.lines).toEqual([
            "- The cache lives in the cache directory [1]",
            "- Install with npm [2]",
        ]);
        expect(answer.citations.map((c) => c.ref)).toEqual([
            "faq.md#Cache",
            "guide.md#Setup",
        ]);
        expect(answer.strategy).toBe("model");
        expect(answer.degraded).toBe(false);

        expect(model.prompts).toHaveLength(1);
        const [system, user] = model.prompts[0];
        expect(system.role).toBe("system");
        expect(user.content).toContain(
            "[1] guide.md#Setup\n# Setup\nInstall the package with npm.",
        );
        expect(user.content).toContain("\n---\n[2] faq.md#Cache\n# Cache\n");
        expect(user.content).toContain(
            'Question: "Where is the cache directory?"',
        );
    });

    test("modelErrorDegrades", async () => {
        const model = new TestModel(async () => error("boom"));
        const answer = await new AnswerSynthesizer(
            engine,
            new LanguageModelAnswerStrategy(model),
        ).answer(question, {}, now);
        expect(answer.degraded).toBe(true);
        expect(answer.strategy).toBe("extractive");
        expect(answer.lines).toEqual(extractiveLines);
    });

    test("uncitedModelAnswerDegrades", async () => {
        const model = new TestModel(async () =>
            success("I think it is somewhere."),
        );
        const answer = await new AnswerSynthesizer(
            engine,
            new LanguageModelAnswerStrategy(model),
        ).answer(question, {}, now);
        expect(answer.degraded).toBe(true);
        expect(answer.lines).toEqual(extractiveLines);
    });

    test("modelTimeoutDegrades", async () => {
        const model = new TestModel(
            () => new Promise<Result<string>>(() => {}),
        );
        const answer = await new AnswerSynthesizer(
            engine,
            new LanguageModelAnswerStrategy(model),
            20,
        ).answer(question, {}, now);
        expect(answer.degraded).toBe(true);
        expect(answer.lines).toEqual(extractiveLines);
    });

    test("modelNotCalledWithoutEvidence", async () => {
        const model = new TestModel(async () => success("- never [1]"));
        const answer = await new AnswerSynthesizer(
            engine,
            new LanguageModelAnswerStrategy(model),
        ).answer("zebra", {}, now);
        expect(model.prompts).toHaveLength(0);
        expect(answer.lines).toEqual([]);
        expect(answer.degraded).toBe(false);
    });
});

describe("docindex.answerStrategies", () => {
    test("splitSentences", () => {
        const text = [
            "# Heading",
            "First sentence. Second one!",
            "continues here?",
            "",
            "- list item",
            "1. numbered item",
            "```",
            "code. inside.",
            "```",
            "> quoted",
        ].join("\n");
        expect(splitSentences(text)).toEqual([
            "First sentence.",
            "Second one!",
            "continues here?",
            "list item",
            "numbered item",
            "quoted",
        ]);
    });

    test("parseCitedLines", () => {
        const store = createTestStore();
        try {
            indexDocument(store, "one.md", "# One\nfirst");
            indexDocument(store, "two.md", "# Two\nsecond");
            const evidence = new QueryEngine(store).rank(
                "first second",
                {},
                now,
            ).ranked;
            expect(evidence).toHaveLength(2);

            const parsed = parseCitedLines(
                [
                    "* Both [2] and [1]",
                    "2) Bad ref [0] good ref [2]",
                    "[3] nothing valid",
                ].join("\n"),
                evidence,
            );
            expect(parsed.lines).toEqual([
                "- Both [1] and [2]",
                "- Bad ref good ref [1]",
            ]);
            expect(parsed.cited).toEqual([evidence[1], evidence[0]]);
        } finally {
            store.close();
        }
    });

    test("packEvidence", () => {
        const store = createTestStore();
        try {
            indexDocument(store, "one.md", "# One\nshared words here");
            indexDocument(store, "two.md", "# Two\nshared words");
            const evidence = new QueryEngine(store).rank(
                "shared",
                {},
                now,
            ).ranked;
            expect(packEvidence(evidence, 5)).toEqual([evidence[0]]);
            expect(packEvidence(evidence, 1000)).toEqual(evidence);
            expect(packEvidence([], 1000)).toEqual([]);
        } finally {
            store.close();
        }
    });

    test("citationRef", () => {
        expect(citationRef("a.md", "Intro")).toBe("a.md#Intro");
        expect(citationRef("a.md", "")).toBe("a.md");
    });
});

describe("docindex.withTimeout", () => {
    test("resolves", async () => {
        await expect(withTimeout(Promise.resolve(7), 1000)).resolves.toBe(7);
    });
    test("timesOut", async () => {
        const never = new Promise<number>(() => {});
        await expect(withTimeout(never, 10)).rejects.toBeInstanceOf(
            BackendTimeoutError,
        );
    });
    test("propagatesRejection", async () => {
        await expect(
            withTimeout(Promise.reject(new Error("nope")), 1000),
        ).rejects.toThrow("nope");
    });
});
