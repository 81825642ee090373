/**
 * Proxy URL resolution from the standard proxy environment variables.
 *
 * Resolution order:
 * 1. target must parse as a URL
 * 2. no_proxy / NO_PROXY: "*" or a host suffix match → direct connection
 * 3. scheme dispatch over https_proxy, ftp_proxy, http_proxy, all_proxy
 *    (lowercase name first, uppercase when the lowercase one is unset)
 * 4. chosen value must parse and carry a host; a missing port becomes 8080
 *
 * Every failure resolves to `undefined` (connect directly).
 */
import { EnvironmentAccessor, lookupVariable, processEnvironment } from "./env";
import { getLogger } from "./logger";
import { maskProxyUrl } from "./sensitive";
import {
    FALLBACK_CANDIDATES,
    PROXY_ENV_VARS,
    ProxyResolution,
    ResolutionReason,
    ResolvedResolverOptions,
    ResolverOptions,
    SCHEME_CANDIDATES,
    parseResolverOptions,
} from "./types";

const logger = getLogger();

/**
 * Whether `host` is excluded by a no_proxy value.
 *
 * Tokens are split on commas and spaces and compared as plain suffixes, so
 * `example.org` also excludes `notexample.org`. Empty tokens never match.
 */
export function isNoProxy(host: string | null, noProxy: string): boolean {
    if (noProxy === "*") {
        return true;
    }
    if (!host) {
        return false;
    }
    return noProxy.split(/[, ]/).some((token) => token !== "" && host.endsWith(token));
}

function parseUrl(value: string): URL | null {
    try {
        return new URL(value);
    } catch {
        return null;
    }
}

export class ProxyResolver {
    private readonly env: EnvironmentAccessor;
    private readonly options: ResolvedResolverOptions;

    constructor(env: EnvironmentAccessor = processEnvironment, options: ResolverOptions = {}) {
        this.env = env;
        this.options = parseResolverOptions(options);
    }

    resolve(target: string): string | undefined {
        return this.explain(target).proxyUrl;
    }

    explain(target: string): ProxyResolution {
        const tried: string[] = [];
        const outcome = (
            reason: ResolutionReason,
            proxyUrl?: string,
            source: string | null = null
        ): ProxyResolution => {
            logger.debug(`${maskProxyUrl(target)} -> ${maskProxyUrl(proxyUrl ?? "DIRECT")} (${reason})`);
            return { proxyUrl, reason, source, tried };
        };

        const url = parseUrl(target);
        if (!url) {
            return outcome("invalid-target");
        }

        const noProxy = lookupVariable(this.env, PROXY_ENV_VARS.no);
        if (noProxy.value !== null && isNoProxy(url.hostname || null, noProxy.value)) {
            return outcome(noProxy.value === "*" ? "no-proxy-wildcard" : "no-proxy-match", undefined, noProxy.source);
        }

        const scheme = url.protocol.slice(0, -1);
        const candidates = SCHEME_CANDIDATES.get(scheme) ?? FALLBACK_CANDIDATES;

        let value: string | null = null;
        let source: string | null = null;
        for (const kind of candidates) {
            const lookup = lookupVariable(this.env, PROXY_ENV_VARS[kind]);
            tried.push(...lookup.tried);
            if (lookup.value !== null) {
                value = lookup.value;
                source = lookup.source;
                break;
            }
        }

        if (value === null) {
            return outcome("no-candidate");
        }

        const proxy = parseUrl(value);
        if (!proxy) {
            logger.warn(`${source} is not a valid URL, connecting directly`);
            return outcome("invalid-proxy-url", undefined, source);
        }
        if (!proxy.hostname) {
            logger.warn(`${source} has no host, connecting directly`);
            return outcome("proxy-missing-host", undefined, source);
        }
        if (proxy.port !== "") {
            return outcome("proxy", value, source);
        }

        // file: URLs cannot carry a port; URL would ignore the assignment
        if (proxy.protocol === "file:") {
            return outcome("port-rejected", undefined, source);
        }
        // A port equal to the scheme default is kept implicit in href
        proxy.port = String(this.options.defaultPort);
        return outcome("proxy", proxy.href, source);
    }
}

const defaultResolver = new ProxyResolver();

/**
 * Proxy URL for `target`, or `undefined` to connect directly.
 */
export function resolveProxyForUrl(target: string, env?: EnvironmentAccessor): string | undefined {
    if (!env) {
        return defaultResolver.resolve(target);
    }
    return new ProxyResolver(env).resolve(target);
}
