// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    DateBound,
    parseDateBound,
    resolveDateRange,
} from "../src/dateRange.js";
import { InvalidFilterError } from "../src/errors.js";

const now = new Date("2024-06-15T12:00:00.000Z");

function iso(time: number | undefined): string | undefined {
    return time === undefined ? undefined : new Date(time).toISOString();
}

function bound(value: string, which: DateBound = "since"): string | undefined {
    return iso(parseDateBound(value, which, now));
}

describe("docindex.dateRange", () => {
    test("partialDates", () => {
        expect(bound("2024")).toBe("2024-01-01T00:00:00.000Z");
        expect(bound("2024", "until")).toBe("2024-12-31T23:59:59.999Z");
        expect(bound("2024-02")).toBe("2024-02-01T00:00:00.000Z");
        expect(bound("2024-02", "until")).toBe("2024-02-29T23:59:59.999Z");
        expect(bound("2024-03-05", "until")).toBe("2024-03-05T23:59:59.999Z");
    });
    test("relativeSpans", () => {
        expect(bound("7d")).toBe("2024-06-08T12:00:00.000Z");
        expect(bound("2m")).toBe("2024-04-16T12:00:00.000Z");
        expect(bound("0d", "until")).toBe("2024-06-15T12:00:00.000Z");
    });
    test("isoAndDates", () => {
        expect(bound("2024-03-05T10:00:00Z")).toBe("2024-03-05T10:00:00.000Z");
        expect(bound("2024-03-05T10:00:00.250Z")).toBe(
            "2024-03-05T10:00:00.250Z",
        );
        expect(bound("2024-03-05T10:00:00+02:00")).toBe(
            "2024-03-05T08:00:00.000Z",
        );
        expect(parseDateBound(new Date(0), "since", now)).toBe(0);
        expect(parseDateBound(undefined, "since", now)).toBeUndefined();
        expect(parseDateBound("  ", "until", now)).toBeUndefined();
    });
    test("invalidDates", () => {
        const invalid = ["yesterday", "2024-13", "2024-02-30", "not-a-date"];
        for (const value of invalid) {
            expect(() => bound(value)).toThrow(InvalidFilterError);
        }
        expect(() =>
            parseDateBound(new Date(Number.NaN), "until", now),
        ).toThrow(InvalidFilterError);
    });
    test("nonIsoTextRejected", () => {
        const loose = ["7", "March 5 2024", "5/3/2024", "Tue, 05 Mar 2024"];
        for (const value of loose) {
            expect(() => bound(value)).toThrow(InvalidFilterError);
        }
    });
    test("rangeOrder", () => {
        expect(() =>
            resolveDateRange("2024-05-01", "2024-04-01", now),
        ).toThrow(InvalidFilterError);
        const range = resolveDateRange("2024-05", "2024-05", now);
        expect(iso(range.since)).toBe("2024-05-01T00:00:00.000Z");
        expect(iso(range.until)).toBe("2024-05-31T23:59:59.999Z");
        expect(resolveDateRange(undefined, undefined, now)).toEqual({
            since: undefined,
            until: undefined,
        });
    });
});
