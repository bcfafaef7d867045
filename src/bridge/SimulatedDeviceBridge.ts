import fs from 'fs';
import path from 'path';
import type { Writable } from 'stream';
import { ExecutionError, TransferError } from './BridgeError.js';
import type { DeviceBridge, DeviceSession } from './DeviceBridge.js';
import type { PushRecord, ShellRecord, ShellResult, Target } from '../types/index.js';

export interface SimulatedShellReply {
    output?: string;
    exitCode?: number | null;
}

export type SimulatedShellResponder = (tokens: readonly string[], target: Target) => SimulatedShellReply | undefined;

export interface SimulatedDeviceBridgeOptions {
    devices?: Target[];
    version?: string;
    /** Receives `output` from the responder, as a real device would stream it. */
    output?: Writable;
    responder?: SimulatedShellResponder;
    /** When set, every push fails with a TransferError carrying this message. */
    pushFault?: string;
    /** Zero-based index of the shell call that fails with an ExecutionError. */
    shellFaultAt?: number;
    /** Decides whether a local path can be pushed. Defaults to checking the disk. */
    fileExists?: (localPath: string) => boolean;
}

/**
 * In-process DeviceBridge. Keeps a record of every transfer and command so
 * the orchestration can be observed without a device attached.
 */
export class SimulatedDeviceBridge implements DeviceBridge {
    public readonly pushes: PushRecord[] = [];
    public readonly commands: ShellRecord[] = [];
    /** Remote paths written by push. */
    public readonly files = new Set<string>();

    private bound: Target | null = null;
    private shellCalls = 0;
    private readonly targets: Target[];
    private readonly versionString: string;

    constructor(private readonly options: SimulatedDeviceBridgeOptions = {}) {
        this.targets = [...(options.devices ?? [])];
        this.versionString = options.version ?? 'Simulated Device Bridge 1.0.0';
    }

    async version(): Promise<string> {
        return this.versionString;
    }

    async devices(): Promise<Target[]> {
        return [...this.targets];
    }

    setDevice(target: Target): DeviceSession {
        this.bound = target;
        return {
            target,
            push: async (localPath, remotePath) => this.push(target, localPath, remotePath),
            shell: async (tokens) => this.shell(target, tokens),
        };
    }

    getDevice(): Target | null {
        return this.bound;
    }

    private push(target: Target, localPath: string, remotePath: string): void {
        if (this.options.pushFault !== undefined) {
            throw new TransferError(this.options.pushFault, target, localPath, remotePath);
        }
        const fileExists = this.options.fileExists ?? fs.existsSync;
        if (!fileExists(localPath)) {
            throw new TransferError(`Local file not found: ${localPath}`, target, localPath, remotePath);
        }
        this.pushes.push({ target, localPath, remotePath });

        // adb semantics: a trailing slash means "into this directory".
        const destination = remotePath.endsWith('/')
            ? path.posix.join(remotePath, path.basename(localPath))
            : remotePath;
        this.files.add(destination);
    }

    private shell(target: Target, tokens: readonly string[]): ShellResult {
        const callIdx = this.shellCalls++;
        if (callIdx === this.options.shellFaultAt) {
            throw new ExecutionError(`Simulated channel failure on call ${callIdx}`, target, tokens);
        }
        this.commands.push({ target, tokens: [...tokens] });

        const reply = this.options.responder?.(tokens, target) ?? {};
        if (reply.output !== undefined) {
            this.options.output?.write(reply.output);
        }
        return { exitCode: reply.exitCode === undefined ? 0 : reply.exitCode };
    }
}
