/**
 * Device Authorization Client
 *
 * Client facade and builders.
 */

export * from "./device-auth-client";
export * from "./builder";
