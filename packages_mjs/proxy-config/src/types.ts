/**
 * Data models for proxy resolution.
 */
import { z } from "zod";
import { InvalidResolverOptionsError } from "./errors";

export const ResolverOptionsSchema = z.object({
    defaultPort: z.number().int().min(1).max(65535).default(8080),
});

export type ResolverOptions = z.input<typeof ResolverOptionsSchema>;
export type ResolvedResolverOptions = z.infer<typeof ResolverOptionsSchema>;

export function parseResolverOptions(options: unknown): ResolvedResolverOptions {
    const result = ResolverOptionsSchema.safeParse(options ?? {});
    if (!result.success) {
        throw new InvalidResolverOptionsError(
            result.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
        );
    }
    return result.data;
}

export function validateResolverOptions(options: unknown): boolean {
    return ResolverOptionsSchema.safeParse(options ?? {}).success;
}

export interface EnvVarPair {
    lower: string;
    upper: string;
}

export const PROXY_ENV_VARS = {
    http: { lower: "http_proxy", upper: "HTTP_PROXY" },
    https: { lower: "https_proxy", upper: "HTTPS_PROXY" },
    ftp: { lower: "ftp_proxy", upper: "FTP_PROXY" },
    all: { lower: "all_proxy", upper: "ALL_PROXY" },
    no: { lower: "no_proxy", upper: "NO_PROXY" },
} as const;

export type ProxyKind = "http" | "https" | "ftp" | "all";

/** Candidate variables per target scheme, highest priority first. */
export const SCHEME_CANDIDATES: ReadonlyMap<string, readonly ProxyKind[]> = new Map<string, readonly ProxyKind[]>([
    ["https", ["https", "http", "all"]],
    ["http", ["http", "all"]],
    ["ftp", ["ftp", "http", "all"]],
]);

export const FALLBACK_CANDIDATES: readonly ProxyKind[] = ["all"];

export interface EnvVarLookup {
    value: string | null;
    source: string | null;
    tried: string[];
}

export type ResolutionReason =
    | "proxy"
    | "invalid-target"
    | "no-proxy-wildcard"
    | "no-proxy-match"
    | "no-candidate"
    | "invalid-proxy-url"
    | "proxy-missing-host"
    | "port-rejected";

export interface ProxyResolution {
    proxyUrl: string | undefined;
    reason: ResolutionReason;
    /** Variable the proxy value was read from */
    source: string | null;
    /** Candidate variable names consulted, in order */
    tried: string[];
}
