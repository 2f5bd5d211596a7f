export * from "./constants";
export * from "./errors";
export * from "./permute";
export * from "./polynomial";
export * from "./integrate";
export * from "./evaluate";
export * from "./report";
export * from "./lagrange";
