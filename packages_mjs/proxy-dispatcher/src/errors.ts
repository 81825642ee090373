export class ProxyDispatcherError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ProxyDispatcherError';
    }
}

export class AdapterNotFoundError extends ProxyDispatcherError {
    constructor(
        public adapterName: string,
        public available: string[]
    ) {
        super(`Adapter '${adapterName}' not found. Available: ${available.join(', ')}`);
        this.name = 'AdapterNotFoundError';
    }
}

export class UnsupportedProxyProtocolError extends ProxyDispatcherError {
    constructor(
        public adapterName: string,
        public protocol: string
    ) {
        super(`Adapter '${adapterName}' cannot tunnel through '${protocol}' proxies`);
        this.name = 'UnsupportedProxyProtocolError';
    }
}

export class InvalidFactoryConfigError extends ProxyDispatcherError {
    constructor(public issues: string[]) {
        super(`Invalid dispatcher factory config: ${issues.join('; ')}`);
        this.name = 'InvalidFactoryConfigError';
    }
}
