// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export * from "./types.js";
export * from "./errors.js";
export * from "./tokenizer.js";
export * from "./frontMatter.js";
export * from "./documentParser.js";
export * from "./indexStore.js";
export * from "./pathWriteQueue.js";
export * from "./blobSource.js";
export * from "./synchronizer.js";
export * from "./dateRange.js";
export * from "./filters.js";
export * from "./snippet.js";
export * from "./queryEngine.js";
export * from "./facets.js";
export * from "./answerStrategies.js";
export * from "./answerSynthesizer.js";
export * from "./config.js";
export * from "./docIndex.js";
