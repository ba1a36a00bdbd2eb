/**
 * Core Components
 *
 * Transport, time and client authentication.
 */

export * from "./transport";
export * from "./clock";
export * from "./client-auth";
