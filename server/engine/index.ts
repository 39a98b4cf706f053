export * from "./errors";
export * from "./retryPolicy";
export * from "./resultCache";
export * from "./resilientCall";
export * from "./geo";
export * from "./records";
export * from "./proximity";
export * from "./ranking";
