/**
 * TLS settings read from the environment.
 */
import { EnvironmentAccessor, processEnvironment } from "@proxy-env/proxy-config";

export function isSslVerifyDisabledByEnv(env: EnvironmentAccessor = processEnvironment): boolean {
    if (env.get("NODE_TLS_REJECT_UNAUTHORIZED") === "0") {
        return true;
    }
    if (env.get("SSL_CERT_VERIFY") === "0") {
        return true;
    }
    return false;
}
