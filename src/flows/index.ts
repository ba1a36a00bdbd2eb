/**
 * Device Authorization Flow
 */

export * from "./device";
