/**
 * Telemetry
 *
 * Logging for device authorization.
 */

export * from "./logging";
