// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { InvalidFilterError } from "docindex";
import {
    firstString,
    parseAnswerParams,
    parseBoolean,
    parseFacetParams,
    parseInteger,
    parseSearchParams,
    parseTagList,
} from "../src/params.js";

describe("server.params", () => {
    test("firstString", () => {
        expect(firstString("a")).toBe("a");
        expect(firstString(["b", "c"])).toBe("b");
        expect(firstString({ nested: "x" })).toBeUndefined();
        expect(firstString(undefined)).toBeUndefined();
    });

    test("tagList", () => {
        expect(parseTagList("python, ml")).toEqual(["python", "ml"]);
        expect(parseTagList(["python", "ml,ai"])).toEqual([
            "python",
            "ml",
            "ai",
        ]);
        expect(parseTagList(" , ")).toBeUndefined();
        expect(parseTagList(undefined)).toBeUndefined();
    });

    test("boolean", () => {
        expect(parseBoolean("YES", "flag")).toBe(true);
        expect(parseBoolean("0", "flag")).toBe(false);
        expect(parseBoolean("", "flag")).toBeUndefined();
        expect(() => parseBoolean("maybe", "flag")).toThrow(InvalidFilterError);
    });

    test("integer", () => {
        expect(parseInteger("12", "limit")).toBe(12);
        expect(parseInteger("-3", "limit")).toBe(-3);
        expect(parseInteger(undefined, "limit")).toBeUndefined();
        expect(() => parseInteger("1.5", "limit")).toThrow("Invalid 'limit'");
        expect(() => parseInteger("ten", "limit")).toThrow(InvalidFilterError);
    });

    test("searchParams", () => {
        expect(
            parseSearchParams({
                q: "machine learning",
                tags: "python,ml",
                require_all_tags: "false",
                since: "30d",
                until: "2024-06",
                date_field: "Modified",
                path_prefix: "notes/",
                sort: "date",
                limit: "5",
            }),
        ).toEqual({
            q: "machine learning",
            options: {
                tags: ["python", "ml"],
                requireAllTags: false,
                since: "30d",
                until: "2024-06",
                dateField: "modified",
                pathPrefix: "notes/",
                sort: "date",
                limit: 5,
            },
        });
        expect(parseSearchParams({}).q).toBe("");
    });

    test("invalidChoices", () => {
        let caught: unknown;
        try {
            parseSearchParams({ sort: "relevance" });
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(InvalidFilterError);
        expect(
            caught instanceof InvalidFilterError && caught.parameter,
        ).toBe("sort");
        expect(() => parseSearchParams({ date_field: "published" })).toThrow(
            "Invalid 'date_field': expected one of created, modified, auto",
        );
        expect(() => parseFacetParams({ granularity: "week" })).toThrow(
            "Invalid 'granularity': expected one of day, month, year",
        );
    });

    test("answerAndFacetParams", () => {
        const answer = parseAnswerParams({ q: "where", k: "3", tags: "work" });
        expect(answer.q).toBe("where");
        expect(answer.options.topK).toBe(3);
        expect(answer.options.tags).toEqual(["work"]);

        const facets = parseFacetParams({ q: "alpha", granularity: "year" });
        expect(facets.query).toBe("alpha");
        expect(facets.granularity).toBe("year");
    });
});
