// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolveDateRange } from "./dateRange.js";
import { InvalidFilterError } from "./errors.js";
import { normalizeTag } from "./frontMatter.js";
import {
    AppliedFilters,
    DateField,
    IndexedChunk,
    ResolvedFilters,
    SearchFilters,
    SortMode,
} from "./types.js";

export const DATE_FIELDS: readonly DateField[] = [
    "created",
    "modified",
    "auto",
];
export const SORT_MODES: readonly SortMode[] = ["score", "date", "date_asc"];

/**
 * Validate and normalize filters. Throws InvalidFilterError.
 */
export function resolveFilters(
    filters: SearchFilters,
    now: Date = new Date(),
): ResolvedFilters {
    const dateField = filters.dateField ?? "auto";
    if (!DATE_FIELDS.includes(dateField)) {
        throw new InvalidFilterError(
            `Unknown date field '${dateField}': expected one of ${DATE_FIELDS.join(", ")}`,
            "dateField",
        );
    }
    const tags = new Set<string>();
    for (const tag of filters.tags ?? []) {
        const normalized = normalizeTag(tag);
        if (normalized) {
            tags.add(normalized);
        }
    }
    const range = resolveDateRange(filters.since, filters.until, now);
    return {
        tags: [...tags],
        requireAllTags: filters.requireAllTags ?? true,
        since: range.since,
        until: range.until,
        dateField,
        pathPrefix: filters.pathPrefix || undefined,
    };
}

export function resolveSort(sort: SortMode | undefined): SortMode {
    const mode = sort ?? "score";
    if (!SORT_MODES.includes(mode)) {
        throw new InvalidFilterError(
            `Unknown sort '${mode}': expected one of ${SORT_MODES.join(", ")}`,
            "sort",
        );
    }
    return mode;
}

export function resolveLimit(
    limit: number | undefined,
    defaultLimit: number,
): number {
    if (limit === undefined) {
        return defaultLimit;
    }
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new InvalidFilterError(
            `Invalid limit '${limit}': expected a positive integer`,
            "limit",
        );
    }
    return limit;
}

/**
 * The time a chunk is filtered, sorted and bucketed by.
 * "auto" prefers the document's own date over the source modification time.
 */
export function effectiveTime(
    chunk: IndexedChunk,
    dateField: DateField,
): number | undefined {
    let iso: string | undefined;
    switch (dateField) {
        case "created":
            iso = chunk.createdAt;
            break;
        case "modified":
            iso = chunk.modifiedAt;
            break;
        default:
            iso = chunk.createdAt ?? chunk.modifiedAt;
            break;
    }
    if (iso === undefined) {
        return undefined;
    }
    const time = Date.parse(iso);
    return Number.isNaN(time) ? undefined : time;
}

/**
 * Path, tag and date filtering shared by search, facets and answers.
 * A chunk without the selected date never passes a date bound.
 */
export function matchesFilters(
    chunk: IndexedChunk,
    filters: ResolvedFilters,
): boolean {
    if (filters.pathPrefix && !chunk.path.startsWith(filters.pathPrefix)) {
        return false;
    }
    if (filters.tags.length > 0) {
        const matched = filters.requireAllTags
            ? filters.tags.every((tag) => chunk.tags.includes(tag))
            : filters.tags.some((tag) => chunk.tags.includes(tag));
        if (!matched) {
            return false;
        }
    }
    if (filters.since !== undefined || filters.until !== undefined) {
        const time = effectiveTime(chunk, filters.dateField);
        if (time === undefined) {
            return false;
        }
        if (filters.since !== undefined && time < filters.since) {
            return false;
        }
        if (filters.until !== undefined && time > filters.until) {
            return false;
        }
    }
    return true;
}

export function describeFilters(
    filters: ResolvedFilters,
    sort: SortMode,
    limit: number,
): AppliedFilters {
    return {
        tags: filters.tags,
        requireAllTags: filters.requireAllTags,
        since: toIso(filters.since),
        until: toIso(filters.until),
        dateField: filters.dateField,
        pathPrefix: filters.pathPrefix ?? null,
        sort,
        limit,
    };
}

function toIso(time: number | undefined): string | null {
    return time === undefined ? null : new Date(time).toISOString();
}
