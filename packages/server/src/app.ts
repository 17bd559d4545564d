// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import express, {
    Express,
    NextFunction,
    Request,
    Response,
} from "express";
import { DocIndex, describeError } from "docindex";
import {
    parseAnswerParams,
    parseFacetParams,
    parseSearchParams,
} from "./params.js";
import {
    AnswerWire,
    FacetsWire,
    HealthWire,
    SearchWire,
    SyncWire,
    toAnswerWire,
    toErrorResponse,
    toFacetsWire,
    toHealthWire,
    toSearchWire,
    toSyncWire,
} from "./responses.js";

import registerDebug from "debug";
const debug = registerDebug("docindex:server");

/**
 * Request handlers independent of express, so they can be called directly.
 */
export function createHandlers(docIndex: DocIndex) {
    return {
        search(query: Record<string, unknown>): SearchWire {
            const { q, options } = parseSearchParams(query);
            return toSearchWire(docIndex.search(q, options));
        },
        async answer(query: Record<string, unknown>): Promise<AnswerWire> {
            const { q, options } = parseAnswerParams(query);
            return toAnswerWire(await docIndex.answer(q, options));
        },
        facets(query: Record<string, unknown>): FacetsWire {
            return toFacetsWire(docIndex.facets(parseFacetParams(query)));
        },
        async sync(): Promise<SyncWire> {
            return toSyncWire(await docIndex.sync());
        },
        health(): HealthWire {
            return toHealthWire(docIndex.stats());
        },
    };
}

export function createApp(docIndex: DocIndex): Express {
    const handlers = createHandlers(docIndex);
    const app = express();

    app.get("/search", (req: Request, res: Response) => {
        res.json(handlers.search(req.query));
    });

    app.get(
        "/answer",
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                res.json(await handlers.answer(req.query));
            } catch (e) {
                next(e);
            }
        },
    );

    app.get("/facets", (req: Request, res: Response) => {
        res.json(handlers.facets(req.query));
    });

    app.post(
        "/sync",
        async (_req: Request, res: Response, next: NextFunction) => {
            try {
                res.json(await handlers.sync());
            } catch (e) {
                next(e);
            }
        },
    );

    app.get("/healthz", (_req: Request, res: Response) => {
        res.json(handlers.health());
    });

    app.use(
        (error: unknown, req: Request, res: Response, _next: NextFunction) => {
            const { status, body } = toErrorResponse(error);
            debug(
                "%s %s failed with %d: %s",
                req.method,
                req.path,
                status,
                describeError(error),
            );
            res.status(status).json(body);
        },
    );

    return app;
}
