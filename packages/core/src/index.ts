export * from "./types";
export * from "./errors";
export * from "./frame";
export * from "./change-detector";
export * from "./shared-state";
export * from "./update-signal";
