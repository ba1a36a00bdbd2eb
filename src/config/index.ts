/**
 * Configuration File Loading
 */

export * from "./file";
