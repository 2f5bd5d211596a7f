export * from "./samples";
export * from "./plot";
export * from "./artifact";
