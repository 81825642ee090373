/**
 * Basic usage examples for proxy-dispatcher package.
 *
 * Builds undici dispatchers that follow the proxy environment variables.
 */
import { createMapEnvironment } from "@proxy-env/proxy-config";
import {
    ProxyDispatcherFactory,
    getProxyDispatcher,
} from "@proxy-env/proxy-dispatcher";

// =============================================================================
// Example 1: Dispatcher from process.env
// =============================================================================
async function example1_processEnv(): Promise<void> {
    const result = getProxyDispatcher("https://api.example.com");

    console.log("Example 1 - process.env:");
    console.log("  proxyUrl:", result.config.proxyUrl);
    console.log("  verifySsl:", result.config.verifySsl);

    // const response = await fetch("https://api.example.com", {
    //     dispatcher: result.client
    // });

    await result.client.close();
}

// =============================================================================
// Example 2: Per-target decisions
// =============================================================================
async function example2_perTarget(): Promise<void> {
    const factory = new ProxyDispatcherFactory(
        { timeout: 10000 },
        "undici",
        createMapEnvironment({
            https_proxy: "http://corporate-proxy:3128",
            no_proxy: "localhost,.internal",
        })
    );

    for (const target of ["https://api.example.com", "https://wiki.internal"]) {
        const result = factory.getProxyDispatcher(target);
        console.log(`Example 2 - ${target}:`, result.config.proxyUrl ?? "DIRECT");
        await result.client.close();
    }
}

// =============================================================================
// Example 3: Options only
// =============================================================================
function example3_options(): void {
    const factory = new ProxyDispatcherFactory({ certVerify: true });
    console.log("Example 3 - options:", JSON.stringify(factory.getDispatcherOptions("https://api.example.com"), null, 2));
}

async function main(): Promise<void> {
    console.log("=== proxy-dispatcher Examples ===\n");

    await example1_processEnv();
    await example2_perTarget();
    example3_options();

    console.log("\n=== Examples Complete ===");
}

main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
