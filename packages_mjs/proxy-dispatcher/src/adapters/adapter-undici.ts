/**
 * Adapter for undici library.
 */
import { Agent, Dispatcher, ProxyAgent } from "undici";
import { BaseAdapter } from "./base";
import { UnsupportedProxyProtocolError } from "../errors";
import { ConnectOptions, DispatcherOptions, DispatcherResult, ProxyConfig } from "../types";

const TUNNEL_PROTOCOLS = ["http:", "https:"];

export class UndiciAdapter extends BaseAdapter {
    get name(): string {
        return "undici";
    }

    getDispatcherOptions(config: ProxyConfig): DispatcherOptions {
        const connect: ConnectOptions = {
            timeout: config.timeout,
            rejectUnauthorized: config.verifySsl,
        };

        if (config.cert) {
            connect.cert = config.cert;
        }

        if (config.caBundle) {
            connect.ca = config.caBundle;
        }

        return {
            connect,
            pipelining: 0,
        };
    }

    createClient(config: ProxyConfig): DispatcherResult {
        const options = this.getDispatcherOptions(config);
        let client: Dispatcher;

        if (config.proxyUrl) {
            const protocol = new URL(config.proxyUrl).protocol;
            if (!TUNNEL_PROTOCOLS.includes(protocol)) {
                throw new UnsupportedProxyProtocolError(this.name, protocol);
            }
            // requestTls applies to the target behind the tunnel, proxyTls to the proxy itself
            client = new ProxyAgent({
                uri: config.proxyUrl,
                ...options,
                requestTls: options.connect,
                proxyTls: options.connect,
            });
        } else {
            client = new Agent(options);
        }

        return {
            client,
            config,
            proxyDict: options,
        };
    }
}
