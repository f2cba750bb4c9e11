/**
 * Error classes shared by the normalizer, gazetteer and resolver.
 * Nothing on the per-address path throws except InvalidInputError.
 */

export class AddressResolverError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class InvalidInputError extends AddressResolverError {
    constructor(message: string = 'The address must be a string', received?: unknown) {
        super(message, 'INVALID_INPUT', { received_type: received === null ? 'null' : typeof received });
    }
}

export class ConfigurationError extends AddressResolverError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', { fatal: true, ...context });
    }
}
