// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import fs from "node:fs";
import path from "node:path";
import { LocalFolderBlobSource } from "../src/blobSource.js";
import { SourceUnavailableError } from "../src/errors.js";
import { ensureTestDir } from "./testCommon.js";

describe("docindex.blobSource", () => {
    let rootPath: string;
    beforeEach(() => {
        rootPath = fs.mkdtempSync(path.join(ensureTestDir(), "folder-"));
        fs.mkdirSync(path.join(rootPath, "notes"));
        fs.writeFileSync(path.join(rootPath, "a.md"), "# Alpha\n");
        fs.writeFileSync(path.join(rootPath, "notes", "b.md"), "# Beta\n");
    });
    afterEach(() => {
        fs.rmSync(rootPath, { recursive: true, force: true });
    });

    test("listRelativePaths", async () => {
        const source = new LocalFolderBlobSource(rootPath);
        const listed = await source.list("");
        expect(listed.map((blob) => [blob.path, blob.size])).toEqual([
            ["a.md", 8],
            ["notes/b.md", 7],
        ]);
        const notes = await source.list("notes/");
        expect(notes.map((blob) => blob.path)).toEqual(["notes/b.md"]);
    });

    test("fetch", async () => {
        const source = new LocalFolderBlobSource(rootPath);
        expect(await source.fetch("notes/b.md")).toBe("# Beta\n");
        await expect(source.fetch("missing.md")).rejects.toBeInstanceOf(
            SourceUnavailableError,
        );
    });

    test("fetchOutsideRoot", async () => {
        const source = new LocalFolderBlobSource(path.join(rootPath, "notes"));
        for (const blobPath of ["../a.md", "..", "", rootPath]) {
            await expect(source.fetch(blobPath)).rejects.toBeInstanceOf(
                SourceUnavailableError,
            );
        }
    });

    test("fetchUnderFilesystemRoot", async () => {
        const filePath = path.join(rootPath, "a.md");
        const source = new LocalFolderBlobSource(path.parse(filePath).root);
        const relative = path
            .relative(path.parse(filePath).root, filePath)
            .split(path.sep)
            .join("/");
        expect(await source.fetch(relative)).toBe("# Alpha\n");
    });
});
