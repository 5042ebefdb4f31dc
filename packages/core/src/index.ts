export * from "./config";
export * from "./errors";
export * from "./ids";
export * from "./log";
export * from "./text";
export * from "./types";
