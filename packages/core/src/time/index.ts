export * from "./frequency";
