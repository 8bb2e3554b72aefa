export * from "./sma";
export * from "./trailing";
