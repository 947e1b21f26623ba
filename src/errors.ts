/**
 * Errors raised by the report pipeline. Each stage throws its own kind so the
 * operator can tell from the log which stage failed.
 */

export class ReportRunError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'ReportRunError';
        Object.setPrototypeOf(this, ReportRunError.prototype);
    }
}

/**
 * One or more required settings are absent. `problems` lists all of them.
 */
export class ConfigurationError extends ReportRunError {
    constructor(message: string, public readonly problems: string[] = [], cause?: unknown) {
        super(message, 'CONFIGURATION_ERROR', cause);
        this.name = 'ConfigurationError';
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

export type RetrievalFailureKind = 'http' | 'transport';

/**
 * The tracker query failed, either with a non-success HTTP status (`http`)
 * or for any other reason: connection, timeout, unparseable body (`transport`).
 */
export class RetrievalError extends ReportRunError {
    constructor(
        message: string,
        public readonly kind: RetrievalFailureKind,
        public readonly statusCode?: number,
        cause?: unknown
    ) {
        super(message, kind === 'http' ? 'RETRIEVAL_HTTP_ERROR' : 'RETRIEVAL_ERROR', cause);
        this.name = 'RetrievalError';
        Object.setPrototypeOf(this, RetrievalError.prototype);
    }
}

export class DeliveryError extends ReportRunError {
    constructor(message: string, cause?: unknown) {
        super(message, 'DELIVERY_ERROR', cause);
        this.name = 'DeliveryError';
        Object.setPrototypeOf(this, DeliveryError.prototype);
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
