// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    AnswerOptions,
    DATE_FIELDS,
    DateField,
    FacetOptions,
    InvalidFilterError,
    SORT_MODES,
    SearchFilters,
    SearchOptions,
    SortMode,
    TimeGranularity,
} from "docindex";

/** Query string values as express hands them over */
export type QueryParams = Record<string, unknown>;

const GRANULARITIES: readonly TimeGranularity[] = ["day", "month", "year"];

export function firstString(value: unknown): string | undefined {
    if (typeof value === "string") {
        return value;
    }
    if (Array.isArray(value)) {
        return value.find((item): item is string => typeof item === "string");
    }
    return undefined;
}

/**
 * Tags given as a comma separated list, as repeated parameters, or both.
 */
export function parseTagList(value: unknown): string[] | undefined {
    const values = Array.isArray(value) ? value : [value];
    const tags: string[] = [];
    for (const item of values) {
        if (typeof item !== "string") {
            continue;
        }
        for (const tag of item.split(",")) {
            const trimmed = tag.trim();
            if (trimmed) {
                tags.push(trimmed);
            }
        }
    }
    return tags.length > 0 ? tags : undefined;
}

export function parseBoolean(
    value: unknown,
    name: string,
): boolean | undefined {
    const text = firstString(value)?.trim().toLowerCase();
    if (!text) {
        return undefined;
    }
    if (["true", "1", "yes"].includes(text)) {
        return true;
    }
    if (["false", "0", "no"].includes(text)) {
        return false;
    }
    throw new InvalidFilterError(
        `Invalid '${name}': expected true or false`,
        name,
    );
}

export function parseInteger(value: unknown, name: string): number | undefined {
    const text = firstString(value)?.trim();
    if (!text) {
        return undefined;
    }
    if (!/^-?\d+$/.test(text)) {
        throw new InvalidFilterError(
            `Invalid '${name}': expected an integer`,
            name,
        );
    }
    return Number(text);
}

function parseChoice<T extends string>(
    value: unknown,
    name: string,
    choices: readonly T[],
): T | undefined {
    const text = firstString(value)?.trim().toLowerCase();
    if (!text) {
        return undefined;
    }
    const choice = choices.find((c) => c === text);
    if (choice === undefined) {
        throw new InvalidFilterError(
            `Invalid '${name}': expected one of ${choices.join(", ")}`,
            name,
        );
    }
    return choice;
}

export function parseFilters(query: QueryParams): SearchFilters {
    return {
        tags: parseTagList(query["tags"]),
        requireAllTags: parseBoolean(
            query["require_all_tags"],
            "require_all_tags",
        ),
        since: firstString(query["since"]),
        until: firstString(query["until"]),
        dateField: parseChoice<DateField>(
            query["date_field"],
            "date_field",
            DATE_FIELDS,
        ),
        pathPrefix: firstString(query["path_prefix"]),
    };
}

export function parseSearchParams(query: QueryParams): {
    q: string;
    options: SearchOptions;
} {
    return {
        q: firstString(query["q"]) ?? "",
        options: {
            ...parseFilters(query),
            sort: parseChoice<SortMode>(query["sort"], "sort", SORT_MODES),
            limit: parseInteger(query["limit"], "limit"),
        },
    };
}

export function parseAnswerParams(query: QueryParams): {
    q: string;
    options: AnswerOptions;
} {
    return {
        q: firstString(query["q"]) ?? "",
        options: {
            ...parseFilters(query),
            topK: parseInteger(query["k"], "k"),
        },
    };
}

export function parseFacetParams(query: QueryParams): FacetOptions {
    return {
        ...parseFilters(query),
        query: firstString(query["q"]),
        granularity: parseChoice<TimeGranularity>(
            query["granularity"],
            "granularity",
            GRANULARITIES,
        ),
    };
}
