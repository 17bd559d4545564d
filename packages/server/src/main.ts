// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    createDocIndex,
    describeError,
    loadConfig,
    loadEnvFile,
} from "docindex";
import { createApp } from "./app.js";

loadEnvFile();
const config = loadConfig();
const docIndex = createDocIndex(config);
const app = createApp(docIndex);

const server = app.listen(config.port, () => {
    console.log(
        `docindex listening on http://localhost:${config.port} (${config.source} source, index at ${config.dbPath})`,
    );
});

if (
    docIndex.startScheduler({
        onReport: (report) =>
            console.log(
                `Sync: +${report.added} ~${report.updated} -${report.removed} =${report.unchanged}, ${report.errors.length} errors`,
            ),
        onError: (error) =>
            console.error(`Sync failed: ${describeError(error)}`),
    })
) {
    console.log(`Syncing every ${config.syncIntervalMs}ms`);
}

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    console.log(`${signal} received, shutting down`);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await docIndex.close();
}

for (const signal of ["SIGINT", "SIGTERM"]) {
    process.on(signal, () => {
        shutdown(signal).then(
            () => process.exit(0),
            (error: unknown) => {
                console.error(`Shutdown failed: ${describeError(error)}`);
                process.exit(1);
            },
        );
    });
}
