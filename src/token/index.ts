/**
 * Token Introspection
 */

export * from "./introspection";
