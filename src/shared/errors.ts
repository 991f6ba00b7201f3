// Error taxonomy shared by the gateway, the store and the orchestrator

export class CopierError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CopierError';
    }
}

/** Transient: the venue could not be reached. The target is retried next run. */
export class ConnectionError extends CopierError {
    constructor(public readonly venue: string, message: string) {
        super(`[${venue}] ${message}`);
        this.name = 'ConnectionError';
    }
}

/** Credentials rejected. Fatal for the venue for the rest of the run. */
export class AuthError extends CopierError {
    constructor(public readonly venue: string, message: string) {
        super(`[${venue}] ${message}`);
        this.name = 'AuthError';
    }
}

/** The venue refused a single operation (invalid symbol, invalid lot, trading disabled). */
export class RejectError extends CopierError {
    constructor(public readonly venue: string, public readonly reason: string) {
        super(`[${venue}] rejected: ${reason}`);
        this.name = 'RejectError';
    }
}

/** The relationship ledger cannot be trusted. Aborts the whole run. */
export class StateCorruptionError extends CopierError {
    constructor(message: string) {
        super(message);
        this.name = 'StateCorruptionError';
    }
}

export class ConfigValidationError extends CopierError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigValidationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
