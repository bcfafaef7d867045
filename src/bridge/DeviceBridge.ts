import type { ShellResult, Target } from '../types/index.js';

/**
 * A control channel bound to exactly one target. Obtained from
 * {@link DeviceBridge.setDevice}; every transfer and command goes through it.
 */
export interface DeviceSession {
    readonly target: Target;

    /**
     * Copies a local file onto the device.
     * Rejects with TransferError when the file is missing or the copy fails.
     */
    push(localPath: string, remotePath: string): Promise<void>;

    /**
     * Runs the tokens as one remote command line and resolves once the remote
     * process exits. Output is streamed while it runs. The exit code is passed
     * through untouched; only a broken channel rejects (ExecutionError).
     */
    shell(tokens: readonly string[]): Promise<ShellResult>;
}

/**
 * Transport-agnostic device bridge. Anything that can enumerate targets,
 * push a file and run a shell command can implement it.
 */
export interface DeviceBridge {
    /** Bridge tool version, informational only. */
    version(): Promise<string>;

    /** Reachable targets in the order the transport reports them. May be empty. */
    devices(): Promise<Target[]>;

    /**
     * Binds the bridge to `target`. The caller is responsible for passing a
     * member of the last {@link devices} result. Rebinding replaces the
     * previous binding.
     */
    setDevice(target: Target): DeviceSession;

    /** Currently bound target, or `null` while unbound. */
    getDevice(): Target | null;
}
