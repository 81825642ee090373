/**
 * Adapter registry.
 */
import { BaseAdapter } from "./base";
import { UndiciAdapter } from "./adapter-undici";
import { AdapterNotFoundError } from "../errors";

const adapters = new Map<string, new () => BaseAdapter>();

export function registerAdapter(name: string, adapterClass: new () => BaseAdapter): void {
    adapters.set(name, adapterClass);
}

export function getAdapter(name: string): BaseAdapter {
    const AdapterClass = adapters.get(name);
    if (!AdapterClass) {
        throw new AdapterNotFoundError(name, [...adapters.keys()]);
    }
    return new AdapterClass();
}

// Register default
registerAdapter("undici", UndiciAdapter);

export * from "./base";
export * from "./adapter-undici";
