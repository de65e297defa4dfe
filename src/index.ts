// Admin
export * from "./admin/index.js";

// HTTP client
export { basicAuthHeader, createFetchClient, type FetchClient } from "./client/fetch.js";
export type { FetchClientOptions, FetchFn, HttpMethod, StoreResponse } from "./client/types.js";

// Configuration
export * from "./config/index.js";

// Errors
export type { ErrorCode, RawErrorCode } from "./error/index.js";
export { ERROR_CODES, isStreamkeepError, StreamkeepError } from "./error/index.js";

// Logging
export * from "./logger/index.js";

// CLI
export { type BuildProgramOptions, buildProgram } from "./cli/program.js";

// Type definitions
export * from "./types/index.js";
