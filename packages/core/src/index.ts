/**
 * Shared contracts, errors, configuration and numeric helpers. Every other
 * package in the workspace builds on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./series";
export * from "./random";
export * from "./stats";
export * from "./time";
export * from "./env";
export * from "./config";
export * from "./utils/logger";
