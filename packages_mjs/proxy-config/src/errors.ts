export class ProxyConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ProxyConfigError';
    }
}

export class EnvironmentFileError extends ProxyConfigError {
    constructor(
        public filePath: string,
        public reason: string
    ) {
        super(`Cannot load environment file '${filePath}': ${reason}`);
        this.name = 'EnvironmentFileError';
    }
}

export class InvalidResolverOptionsError extends ProxyConfigError {
    constructor(public issues: string[]) {
        super(`Invalid resolver options: ${issues.join('; ')}`);
        this.name = 'InvalidResolverOptionsError';
    }
}
