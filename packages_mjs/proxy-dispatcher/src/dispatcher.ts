/**
 * Convenience functions.
 */
import { EnvironmentAccessor } from "@proxy-env/proxy-config";
import { ProxyDispatcherFactory } from "./factory";
import { DispatchOptions, DispatcherResult, FactoryConfig } from "./types";

const defaultFactory = new ProxyDispatcherFactory();

export function getProxyDispatcher(targetUrl: string, options?: DispatchOptions): DispatcherResult {
    return defaultFactory.getProxyDispatcher(targetUrl, options);
}

export function createProxyDispatcherFactory(
    config?: FactoryConfig,
    adapter?: string,
    env?: EnvironmentAccessor
): ProxyDispatcherFactory {
    return new ProxyDispatcherFactory(config, adapter, env);
}
