/**
 * Response schemas and their inferred types.
 */

export * from "./market";
export * from "./orderbook";
export * from "./trade";
export * from "./account";
