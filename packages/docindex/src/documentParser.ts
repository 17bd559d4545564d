// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    findFrontMatter,
    normalizeTag,
    parseFrontMatter,
} from "./frontMatter.js";
import { tokenize } from "./tokenizer.js";
import { DocumentChunk, ParsedDocument } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:parser");

const HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;
const CODE_FENCE = /^ {0,3}(`{3,}|~{3,})/;
const HASHTAG = /(?:^|[\s(,])#([\p{L}_][\p{L}\p{N}_/-]*)/gu;

/**
 * Split a document into chunks at markdown headings.
 *
 * Each chunk starts at a heading line (or at the first body line, for the
 * preamble) and runs to the line before the next heading. Line numbers count
 * from the first line of the raw text, front-matter included, so a chunk can
 * always be cut back out of the source with {@link sliceLines}.
 *
 * Whitespace-only chunks are dropped: an empty document has no chunks.
 * Throws ParseError for malformed front-matter.
 */
export function parseDocument(
    raw: string,
    path: string,
    modifiedAt: string,
): ParsedDocument {
    const lines = splitLines(raw);
    const block = findFrontMatter(lines);
    const frontMatter = parseFrontMatter(block.yaml, path);
    const inCode = markCodeLines(lines, block.bodyStart);

    const chunks: DocumentChunk[] = [];
    const emit = (start: number, end: number, heading: string) => {
        const text = lines.slice(start, end + 1).join("\n");
        if (!text.trim()) {
            return;
        }
        chunks.push({
            ordinal: chunks.length,
            heading,
            startLine: start + 1,
            endLine: end + 1,
            text,
            tokenCount: tokenize(text).length,
            tags: mergeTags(
                frontMatter.tags,
                extractHashtags(lines, start, end, inCode),
            ),
        });
    };

    let sectionStart = block.bodyStart;
    let heading = "";
    for (let i = block.bodyStart; i < lines.length; ++i) {
        if (inCode[i]) {
            continue;
        }
        const match = HEADING.exec(lines[i]);
        if (match) {
            if (i > sectionStart) {
                emit(sectionStart, i - 1, heading);
            }
            sectionStart = i;
            heading = headingText(match[2]);
        }
    }
    if (sectionStart < lines.length) {
        emit(sectionStart, lines.length - 1, heading);
    }

    debug("Parsed %s: %d lines, %d chunks", path, lines.length, chunks.length);
    return {
        path,
        modifiedAt,
        frontMatter,
        chunks,
        lineCount: lines.length,
    };
}

/**
 * Split text into lines. A trailing newline does not start an extra line
 * and carriage returns before newlines are dropped.
 */
export function splitLines(raw: string): string[] {
    if (!raw) {
        return [];
    }
    const lines = raw.split("\n");
    if (lines[lines.length - 1] === "") {
        lines.pop();
    }
    return lines.map((line) =>
        line.endsWith("\r") ? line.slice(0, -1) : line,
    );
}

/**
 * Reconstruct the text of a chunk from its 1-based inclusive line range.
 */
export function sliceLines(
    raw: string,
    startLine: number,
    endLine: number,
): string {
    return splitLines(raw)
        .slice(startLine - 1, endLine)
        .join("\n");
}

export function isHeadingLine(line: string): boolean {
    return HEADING.test(line);
}

function headingText(text: string | undefined): string {
    if (!text) {
        return "";
    }
    // Optional closing sequence: "## Title ##"
    const stripped = text.replace(/(?:^|[ \t]+)#+$/, "");
    return stripped.trim();
}

/**
 * Lines inside fenced code blocks, fences included.
 */
function markCodeLines(lines: string[], start: number): boolean[] {
    const inCode = new Array<boolean>(lines.length).fill(false);
    let fence: string | undefined;
    for (let i = start; i < lines.length; ++i) {
        const match = CODE_FENCE.exec(lines[i]);
        if (fence) {
            inCode[i] = true;
            if (
                match &&
                match[1][0] === fence[0] &&
                match[1].length >= fence.length
            ) {
                fence = undefined;
            }
        } else if (match) {
            inCode[i] = true;
            fence = match[1];
        }
    }
    return inCode;
}

function extractHashtags(
    lines: string[],
    start: number,
    end: number,
    inCode: boolean[],
): string[] {
    const tags: string[] = [];
    for (let i = start; i <= end; ++i) {
        if (inCode[i]) {
            continue;
        }
        for (const match of lines[i].matchAll(HASHTAG)) {
            tags.push(normalizeTag(match[1]));
        }
    }
    return tags;
}

function mergeTags(fileTags: string[], chunkTags: string[]): string[] {
    if (chunkTags.length === 0) {
        return [...fileTags];
    }
    return [...new Set([...fileTags, ...chunkTags])].filter(Boolean).sort();
}
