/**
 * Device Authorization Types
 */

export * from "./token";
export * from "./device";
export * from "./introspection";
export * from "./config";
