export * from "./stats";
export * from "./normal";
