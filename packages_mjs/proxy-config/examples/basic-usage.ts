/**
 * Basic usage examples for proxy-config package.
 *
 * Resolves the proxy for a target URL from the standard proxy variables.
 */
import {
    ProxyResolver,
    createMapEnvironment,
    getProxyEnv,
    resolveProxyForUrl,
} from "@proxy-env/proxy-config";

// =============================================================================
// Example 1: Resolution from process.env
// =============================================================================
function example1_processEnv(): void {
    process.env.https_proxy = "http://corporate-proxy:3128";

    console.log("Example 1 - process.env:", resolveProxyForUrl("https://api.example.com"));
    // Output: "http://corporate-proxy:3128"

    delete process.env.https_proxy;
}

// =============================================================================
// Example 2: Injected environment and scheme dispatch
// =============================================================================
function example2_schemeDispatch(): void {
    const resolver = new ProxyResolver(createMapEnvironment({
        HTTP_PROXY: "http://web-proxy:3128",
        all_proxy: "socks5://socks-proxy:1080",
    }));

    console.log("Example 2 - https:", resolver.resolve("https://api.example.com"));
    // Output: "http://web-proxy:3128" (https falls back to http_proxy)
    console.log("Example 2 - ws:", resolver.resolve("ws://stream.example.com"));
    // Output: "socks5://socks-proxy:1080" (other schemes only use all_proxy)
}

// =============================================================================
// Example 3: no_proxy bypass
// =============================================================================
function example3_noProxy(): void {
    const resolver = new ProxyResolver(createMapEnvironment({
        http_proxy: "http://web-proxy:3128",
        no_proxy: "localhost,.internal",
    }));

    console.log("Example 3 - internal:", resolver.resolve("http://build.internal/status"));
    // Output: undefined
    console.log("Example 3 - explain:", resolver.explain("http://localhost:8000"));
    // Output: { proxyUrl: undefined, reason: "no-proxy-match", source: "no_proxy", tried: [] }
}

// =============================================================================
// Example 4: Default port
// =============================================================================
function example4_defaultPort(): void {
    const env = createMapEnvironment({ http_proxy: "http://web-proxy" });

    console.log("Example 4 - default:", new ProxyResolver(env).resolve("http://example.com"));
    // Output: "http://web-proxy:8080/"
    console.log("Example 4 - custom:", new ProxyResolver(env, { defaultPort: 3128 }).resolve("http://example.com"));
    // Output: "http://web-proxy:3128/"
}

// =============================================================================
// Example 5: Diagnostics snapshot
// =============================================================================
function example5_snapshot(): void {
    console.log("Example 5 - proxy env:", getProxyEnv());
}

function main(): void {
    console.log("=== proxy-config Examples ===\n");

    example1_processEnv();
    example2_schemeDispatch();
    example3_noProxy();
    example4_defaultPort();
    example5_snapshot();

    console.log("\n=== Examples Complete ===");
}

main();
