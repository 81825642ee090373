export * from "./types";
export * from "./errors";
export * from "./env";
export * from "./resolver";
export { getLogger, getLogLevel, setLogLevel } from "./logger";
export type { LogLevel, ProxyConfigLogger } from "./logger";
export { maskProxyUrl, setLogMask } from "./sensitive";
