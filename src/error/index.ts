/**
 * Device Authorization Errors
 */

export * from "./types";
export * from "./mapping";
