/**
 * Abstract base adapter for HTTP libraries.
 */
import { DispatcherOptions, DispatcherResult, ProxyConfig } from "../types";

export abstract class BaseAdapter {
    /** Name of the adapter */
    abstract get name(): string;

    /** Create a configured client (Agent or ProxyAgent for undici) */
    abstract createClient(config: ProxyConfig): DispatcherResult;

    /** Get dispatcher options */
    abstract getDispatcherOptions(config: ProxyConfig): DispatcherOptions;
}
