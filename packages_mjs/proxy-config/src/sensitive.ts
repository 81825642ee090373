/**
 * Credential masking for proxy URLs written to logs.
 */

let logMask = process.env.PROXY_CONFIG_LOG_MASK?.toLowerCase() !== 'false';

export function setLogMask(enabled: boolean): void {
    logMask = enabled;
}

/**
 * Replace the password in a proxy URL's userinfo with `****`.
 * Values that do not parse as URLs are returned as they are.
 */
export function maskProxyUrl(value: string | null | undefined): string {
    if (value === null || value === undefined) {
        return String(value);
    }
    if (!logMask) {
        return value;
    }

    let url: URL;
    try {
        url = new URL(value);
    } catch {
        return value;
    }

    if (!url.password) {
        return value;
    }
    url.password = '****';
    return url.href;
}
