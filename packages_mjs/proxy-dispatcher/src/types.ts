/**
 * Data models for proxy dispatcher.
 */
import { z } from "zod";
import type { Dispatcher } from "undici";
import { InvalidFactoryConfigError } from "./errors";

// Resolved proxy configuration for one target URL
export interface ProxyConfig {
    proxyUrl: string | null;
    verifySsl: boolean;
    timeout: number; // ms
    cert: string | null;
    caBundle: string | null;
}

// Configuration for ProxyDispatcherFactory
export const FactoryConfigSchema = z.object({
    defaultPort: z.number().int().min(1).max(65535).optional(),
    timeout: z.number().int().positive().optional(),
    cert: z.string().nullable().optional(),
    caBundle: z.string().nullable().optional(),
    certVerify: z.boolean().nullable().optional(),
});

export type FactoryConfig = z.infer<typeof FactoryConfigSchema>;

export function parseFactoryConfig(config: unknown): FactoryConfig {
    const result = FactoryConfigSchema.safeParse(config ?? {});
    if (!result.success) {
        throw new InvalidFactoryConfigError(
            result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        );
    }
    return result.data;
}

export interface ConnectOptions {
    timeout: number;
    rejectUnauthorized: boolean;
    cert?: string;
    ca?: string;
}

// Options passed to the undici Agent / ProxyAgent
export interface DispatcherOptions {
    connect: ConnectOptions;
    pipelining: number;
}

export interface DispatchOptions {
    disableTls?: boolean;
    timeout?: number;
}

// Result wrapper
export interface DispatcherResult {
    client: Dispatcher;
    config: ProxyConfig;
    proxyDict: DispatcherOptions;
}
