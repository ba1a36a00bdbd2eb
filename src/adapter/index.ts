/**
 * Host Authentication Adapter
 */

export * from "./authenticate";
