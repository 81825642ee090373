/**
 * Factory for creating proxy-configured HTTP clients.
 */
import { EnvironmentAccessor, ProxyResolver, processEnvironment } from "@proxy-env/proxy-config";
import {
    DispatchOptions,
    DispatcherOptions,
    DispatcherResult,
    FactoryConfig,
    ProxyConfig,
    parseFactoryConfig,
} from "./types";
import { isSslVerifyDisabledByEnv } from "./config";
import { getAdapter, BaseAdapter } from "./adapters";

const DEFAULT_TIMEOUT_MS = 30000;

export class ProxyDispatcherFactory {
    private readonly config: FactoryConfig;
    private readonly adapter: BaseAdapter;
    private readonly env: EnvironmentAccessor;
    private readonly resolver: ProxyResolver;

    constructor(
        config?: FactoryConfig,
        adapterName: string = "undici",
        env: EnvironmentAccessor = processEnvironment
    ) {
        this.config = parseFactoryConfig(config);
        this.adapter = getAdapter(adapterName);
        this.env = env;
        this.resolver = new ProxyResolver(env, { defaultPort: this.config.defaultPort });
    }

    /**
     * Client for `targetUrl`: a ProxyAgent when the environment names a proxy
     * for it, a direct Agent otherwise.
     */
    getProxyDispatcher(targetUrl: string, options: DispatchOptions = {}): DispatcherResult {
        return this.adapter.createClient(this.buildProxyConfig(targetUrl, options));
    }

    getDispatcherOptions(targetUrl: string, options: DispatchOptions = {}): DispatcherOptions {
        return this.adapter.getDispatcherOptions(this.buildProxyConfig(targetUrl, options));
    }

    private buildProxyConfig(targetUrl: string, options: DispatchOptions): ProxyConfig {
        // 1. Resolve Proxy URL
        const proxyUrl = this.resolver.resolve(targetUrl) ?? null;

        // 2. Determine SSL Settings
        let verifySsl = true;
        if (options.disableTls === true) {
            verifySsl = false;
        } else if (this.config.certVerify === false || this.config.certVerify === true) {
            verifySsl = this.config.certVerify;
        } else if (isSslVerifyDisabledByEnv(this.env)) {
            verifySsl = false;
        }

        // 3. Build ProxyConfig
        return {
            proxyUrl,
            verifySsl,
            timeout: options.timeout ?? this.config.timeout ?? DEFAULT_TIMEOUT_MS,
            cert: this.config.cert ?? null,
            caBundle: this.config.caBundle ?? null,
        };
    }
}
