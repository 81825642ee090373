/**
 * Environment accessors and lowercase/uppercase variable lookup.
 */
import fs from "fs";
import dotenv from "dotenv";
import { EnvironmentFileError } from "./errors";
import { EnvVarLookup, EnvVarPair, PROXY_ENV_VARS } from "./types";

/** Case-sensitive read of a named environment variable. */
export interface EnvironmentAccessor {
    get(name: string): string | undefined;
}

export const processEnvironment: EnvironmentAccessor = {
    get: (name: string) => process.env[name],
};

export function createMapEnvironment(
    values: Record<string, string | undefined> | Map<string, string>
): EnvironmentAccessor {
    const store = values instanceof Map ? new Map(values) : new Map<string, string>();
    if (!(values instanceof Map)) {
        for (const [key, value] of Object.entries(values)) {
            if (value !== undefined) {
                store.set(key, value);
            }
        }
    }
    return {
        get: (name: string) => store.get(name),
    };
}

/**
 * Parse a dotenv file into an accessor. `process.env` is left untouched.
 */
export function loadEnvironmentFile(filePath: string): EnvironmentAccessor {
    let content: Buffer;
    try {
        content = fs.readFileSync(filePath);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new EnvironmentFileError(filePath, reason);
    }
    return createMapEnvironment(dotenv.parse(content));
}

/**
 * Read the lowercase name, then the uppercase one when the first has no value.
 * An empty string counts as a value.
 */
export function lookupVariable(env: EnvironmentAccessor, pair: EnvVarPair): EnvVarLookup {
    const tried: string[] = [];
    for (const name of [pair.lower, pair.upper]) {
        tried.push(name);
        const value = env.get(name);
        if (value !== undefined) {
            return { value, source: name, tried };
        }
    }
    return { value: null, source: null, tried };
}

export function getProxyEnv(env: EnvironmentAccessor = processEnvironment): Record<string, string | undefined> {
    const snapshot: Record<string, string | undefined> = {};
    for (const pair of Object.values(PROXY_ENV_VARS)) {
        snapshot[pair.lower] = env.get(pair.lower);
        snapshot[pair.upper] = env.get(pair.upper);
    }
    return snapshot;
}
