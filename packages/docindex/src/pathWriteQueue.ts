// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { QueueObject, queue } from "async";

type WriteTask = () => Promise<void>;

type PathQueue = {
    queue: QueueObject<WriteTask>;
    pending: number;
};

/**
 * Serializes tasks that touch the same path while letting different paths
 * proceed in parallel. A path's queue is dropped once it has no pending work.
 */
export class PathWriteQueue {
    private queues = new Map<string, PathQueue>();

    /** Number of paths with queued or running work */
    public get activePaths(): number {
        return this.queues.size;
    }

    public run<T>(path: string, task: () => Promise<T>): Promise<T> {
        let entry = this.queues.get(path);
        if (!entry) {
            entry = {
                queue: queue(async (item: WriteTask) => item(), 1),
                pending: 0,
            };
            this.queues.set(path, entry);
        }
        const pathQueue = entry;
        pathQueue.pending++;
        return new Promise<T>((resolve, reject) => {
            pathQueue.queue.push(async () => {
                try {
                    resolve(await task());
                } catch (e) {
                    reject(e);
                } finally {
                    pathQueue.pending--;
                    if (
                        pathQueue.pending === 0 &&
                        this.queues.get(path) === pathQueue
                    ) {
                        this.queues.delete(path);
                    }
                }
            });
        });
    }
}
