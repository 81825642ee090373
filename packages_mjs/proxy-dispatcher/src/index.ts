export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./adapters";
export * from "./factory";
export * from "./dispatcher";
