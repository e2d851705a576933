export * from "./node";
export * from "./parse";
export * from "./serialize";
