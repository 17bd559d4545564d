// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { InvalidFilterError } from "./errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;
/** A relative month is a fixed 30 days */
const MONTH_DAYS = 30;

const RELATIVE = /^(\d+)\s*([dm])$/i;
const YEAR = /^(\d{4})$/;
const YEAR_MONTH = /^(\d{4})-(\d{1,2})$/;
const YEAR_MONTH_DAY = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const ISO_TIMESTAMP =
    /^\d{4}-\d\d-\d\d[T ]\d\d:\d\d(:\d\d(\.\d+)?)?(Z|[+-]\d\d:\d\d)?$/i;

export type DateBound = "since" | "until";

export interface DateRange {
    /** Epoch ms, inclusive */
    since?: number | undefined;
    /** Epoch ms, inclusive */
    until?: number | undefined;
}

/**
 * Parse one end of a date range.
 *
 * Accepts Date objects, ISO timestamps, partial dates (YYYY, YYYY-MM,
 * YYYY-MM-DD, all UTC) and relative spans counted back from now ("7d", "3m").
 * A partial date used as `since` means the start of the period it names; used
 * as `until` it means the last millisecond of that period.
 */
export function parseDateBound(
    value: string | Date | undefined,
    bound: DateBound,
    now: Date = new Date(),
): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (value instanceof Date) {
        const time = value.getTime();
        if (Number.isNaN(time)) {
            throw invalidDate(bound, String(value));
        }
        return time;
    }
    const text = value.trim();
    if (!text) {
        return undefined;
    }

    let match = RELATIVE.exec(text);
    if (match) {
        const days =
            match[2].toLowerCase() === "m"
                ? Number(match[1]) * MONTH_DAYS
                : Number(match[1]);
        return now.getTime() - days * DAY_MS;
    }
    match = YEAR.exec(text);
    if (match) {
        const year = Number(match[1]);
        return bound === "since"
            ? Date.UTC(year, 0, 1)
            : Date.UTC(year + 1, 0, 1) - 1;
    }
    match = YEAR_MONTH.exec(text);
    if (match) {
        const year = Number(match[1]);
        const month = Number(match[2]);
        if (month < 1 || month > 12) {
            throw invalidDate(bound, text);
        }
        return bound === "since"
            ? Date.UTC(year, month - 1, 1)
            : Date.UTC(year, month, 1) - 1;
    }
    match = YEAR_MONTH_DAY.exec(text);
    if (match) {
        const year = Number(match[1]);
        const month = Number(match[2]);
        const day = Number(match[3]);
        const start = Date.UTC(year, month - 1, day);
        const check = new Date(start);
        if (
            check.getUTCFullYear() !== year ||
            check.getUTCMonth() !== month - 1 ||
            check.getUTCDate() !== day
        ) {
            throw invalidDate(bound, text);
        }
        return bound === "since" ? start : start + DAY_MS - 1;
    }

    // Only ISO-8601 timestamps reach Date.parse
    const time = ISO_TIMESTAMP.test(text) ? Date.parse(text) : Number.NaN;
    if (Number.isNaN(time)) {
        throw invalidDate(bound, text);
    }
    return time;
}

/**
 * Parse both ends and check that they are in order.
 */
export function resolveDateRange(
    since: string | Date | undefined,
    until: string | Date | undefined,
    now: Date = new Date(),
): DateRange {
    const range: DateRange = {
        since: parseDateBound(since, "since", now),
        until: parseDateBound(until, "until", now),
    };
    if (
        range.since !== undefined &&
        range.until !== undefined &&
        range.since > range.until
    ) {
        throw new InvalidFilterError(
            `'since' (${new Date(range.since).toISOString()}) is after 'until' (${new Date(range.until).toISOString()})`,
            "since",
        );
    }
    return range;
}

function invalidDate(bound: DateBound, text: string): InvalidFilterError {
    return new InvalidFilterError(
        `Invalid '${bound}' date '${text}': expected an ISO date, YYYY, YYYY-MM, YYYY-MM-DD, Nd or Nm`,
        bound,
    );
}
