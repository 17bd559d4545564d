// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { parse as parseYaml } from "yaml";
import { ParseError, describeError } from "./errors.js";
import { FrontMatter } from "./types.js";

const FENCE = "---";
const DATE_KEYS = ["date", "created", "created_at"];
const TAG_KEYS = ["tags", "tag"];

export interface FrontMatterBlock {
    /** YAML between the fences, undefined when the document has none */
    yaml?: string | undefined;
    /** 0-based index of the first line after the closing fence */
    bodyStart: number;
}

/**
 * Locate a leading `---` fenced block. An unterminated block is not
 * front-matter.
 */
export function findFrontMatter(lines: string[]): FrontMatterBlock {
    if (lines.length === 0 || stripBom(lines[0]).trim() !== FENCE) {
        return { bodyStart: 0 };
    }
    for (let i = 1; i < lines.length; ++i) {
        const line = lines[i].trim();
        if (line === FENCE || line === "...") {
            return { yaml: lines.slice(1, i).join("\n"), bodyStart: i + 1 };
        }
    }
    return { bodyStart: 0 };
}

/**
 * Parse the YAML block into the fields the index understands.
 * Throws ParseError when the block is not a YAML mapping.
 */
export function parseFrontMatter(
    yaml: string | undefined,
    path: string,
): FrontMatter {
    if (yaml === undefined || !yaml.trim()) {
        return { tags: [] };
    }
    let data: unknown;
    try {
        data = parseYaml(yaml);
    } catch (e) {
        throw new ParseError(
            `Invalid front-matter in ${path}: ${describeError(e)}`,
            path,
            { cause: e },
        );
    }
    if (data === null || data === undefined) {
        return { tags: [] };
    }
    if (!isRecord(data)) {
        throw new ParseError(
            `Front-matter in ${path} must be a mapping`,
            path,
        );
    }
    const frontMatter: FrontMatter = {
        tags: normalizeTags(firstValue(data, TAG_KEYS)),
    };
    const title = data["title"];
    if (typeof title === "string" && title.trim()) {
        frontMatter.title = title.trim();
    } else if (typeof title === "number") {
        frontMatter.title = String(title);
    }
    const date = normalizeDate(firstValue(data, DATE_KEYS));
    if (date) {
        frontMatter.date = date;
    }
    return frontMatter;
}

/**
 * Tags may be a list or a comma/semicolon separated string.
 */
export function normalizeTags(value: unknown): string[] {
    let raw: unknown[];
    if (typeof value === "string") {
        raw = value.split(/[,;]/);
    } else if (Array.isArray(value)) {
        raw = value;
    } else {
        return [];
    }
    const tags = new Set<string>();
    for (const item of raw) {
        if (typeof item !== "string" && typeof item !== "number") {
            continue;
        }
        const tag = normalizeTag(String(item));
        if (tag) {
            tags.add(tag);
        }
    }
    return [...tags].sort();
}

export function normalizeTag(tag: string): string {
    return tag.trim().replace(/^#+/, "").trim().toLowerCase();
}

/**
 * Dates become ISO-8601 UTC strings. Anything unparseable is treated as absent.
 */
export function normalizeDate(value: unknown): string | undefined {
    let time: number;
    if (value instanceof Date) {
        time = value.getTime();
    } else if (typeof value === "string" || typeof value === "number") {
        const text = String(value).trim();
        if (!text) {
            return undefined;
        }
        time = Date.parse(/^\d{4}$/.test(text) ? `${text}-01-01` : text);
    } else {
        return undefined;
    }
    return Number.isNaN(time) ? undefined : new Date(time).toISOString();
}

function firstValue(data: Record<string, unknown>, keys: string[]): unknown {
    for (const key of keys) {
        const value = data[key];
        if (value !== undefined && value !== null && value !== "") {
            return value;
        }
    }
    return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripBom(line: string): string {
    return line.charCodeAt(0) === 0xfeff ? line.slice(1) : line;
}
