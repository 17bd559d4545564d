// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export * from "./app.js";
export * from "./params.js";
export * from "./responses.js";
