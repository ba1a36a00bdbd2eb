/**
 * Identity Validation
 */

export * from "./rules";
export * from "./identity";
