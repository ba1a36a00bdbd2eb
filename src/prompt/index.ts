/**
 * User Interaction
 */

export * from "./user-prompt";
export * from "./conversation";
