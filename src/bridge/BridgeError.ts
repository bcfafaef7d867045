import type { Target } from '../types/index.js';

export type BridgeErrorCode = 'NO_DEVICE' | 'TRANSFER_FAILED' | 'EXECUTION_FAILED';

/**
 * Base error for device bridge failures.
 * Carries the failing operation and, once bound, the target it addressed.
 */
export class BridgeError extends Error {
    public readonly code: BridgeErrorCode;
    public readonly operation: string;
    public readonly target?: Target;
    public override readonly cause?: Error;

    constructor(code: BridgeErrorCode, message: string, operation: string, target?: Target, cause?: Error) {
        super(message);
        this.name = 'BridgeError';
        this.code = code;
        this.operation = operation;
        this.target = target;
        this.cause = cause;
    }
}

/** Discovery returned no reachable device. Fatal for a run. */
export class DiscoveryEmptyError extends BridgeError {
    constructor() {
        super('NO_DEVICE', 'No device found', 'devices');
        this.name = 'DiscoveryEmptyError';
    }
}

export class TransferError extends BridgeError {
    public readonly localPath: string;
    public readonly remotePath: string;

    constructor(message: string, target: Target, localPath: string, remotePath: string, cause?: Error) {
        super('TRANSFER_FAILED', message, 'push', target, cause);
        this.name = 'TransferError';
        this.localPath = localPath;
        this.remotePath = remotePath;
    }
}

/**
 * The command channel failed. A remote program exiting non-zero is not an
 * ExecutionError.
 */
export class ExecutionError extends BridgeError {
    public readonly tokens: readonly string[];

    constructor(message: string, target: Target, tokens: readonly string[], cause?: Error) {
        super('EXECUTION_FAILED', message, 'shell', target, cause);
        this.name = 'ExecutionError';
        this.tokens = tokens;
    }
}
