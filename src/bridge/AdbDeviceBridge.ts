import { spawn } from 'child_process';
import fs from 'fs';
import type { Readable, Writable } from 'stream';
import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { BridgeError, ExecutionError, TransferError } from './BridgeError.js';
import type { DeviceBridge, DeviceSession } from './DeviceBridge.js';
import type { ShellResult, Target } from '../types/index.js';

const DEVICE_LIST_HEADER = 'List of devices attached';
const READY_STATE = 'device';

export interface DeviceListEntry {
    serial: Target;
    state: string;
}

interface ProcessOutcome {
    code: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
}

/**
 * Parses `adb devices` output into entries, in listed order. Daemon start-up
 * chatter before the header is ignored.
 */
export function parseDeviceList(output: string): DeviceListEntry[] {
    const lines = output.split(/\r?\n/);
    const headerIdx = lines.findIndex((line) => line.trim() === DEVICE_LIST_HEADER);
    if (headerIdx === -1) return [];

    const entries: DeviceListEntry[] = [];
    for (const line of lines.slice(headerIdx + 1)) {
        const [serial, state] = line.trim().split(/\s+/);
        if (!serial || !state) continue;
        entries.push({ serial, state });
    }
    return entries;
}

const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

// ── Builder ─────────────────────────────────────────────────

export class AdbDeviceBridgeBuilder {
    private adbPath = 'adb';
    private output: Writable = process.stdout;
    private logger?: winston.Logger;

    withAdbPath(adbPath: string): this {
        this.adbPath = adbPath;
        return this;
    }

    /** Sink for the streamed output of `shell` commands. */
    withOutput(output: Writable): this {
        this.output = output;
        return this;
    }

    withLogger(logger: winston.Logger): this {
        this.logger = logger;
        return this;
    }

    build(): AdbDeviceBridge {
        return new AdbDeviceBridge(
            this.adbPath,
            this.output,
            this.logger || createLogger('info', 'adb'),
        );
    }
}

// ── Bridge ──────────────────────────────────────────────────

/**
 * DeviceBridge backed by the `adb` executable. Each operation spawns one adb
 * process and waits for it; there is no timeout.
 */
export class AdbDeviceBridge implements DeviceBridge {
    private bound: Target | null = null;

    constructor(
        private readonly adbPath: string,
        private readonly output: Writable,
        private readonly logger: winston.Logger,
    ) { }

    async version(): Promise<string> {
        const outcome = await this.run('version', ['version']);
        if (outcome.code !== 0) {
            throw new BridgeError('EXECUTION_FAILED', `adb version exited with ${outcome.code}`, 'version');
        }
        return outcome.stdout.split(/\r?\n/)[0]?.trim() ?? '';
    }

    async devices(): Promise<Target[]> {
        const outcome = await this.run('devices', ['devices']);
        if (outcome.code !== 0) {
            throw new BridgeError(
                'EXECUTION_FAILED',
                `adb devices exited with ${outcome.code}: ${outcome.stderr.trim()}`,
                'devices',
            );
        }

        const ready: Target[] = [];
        for (const entry of parseDeviceList(outcome.stdout)) {
            if (entry.state === READY_STATE) {
                ready.push(entry.serial);
            } else {
                this.logger.debug(`Skipping ${entry.serial}`, { state: entry.state });
            }
        }
        return ready;
    }

    setDevice(target: Target): DeviceSession {
        this.bound = target;
        return {
            target,
            push: (localPath, remotePath) => this.push(target, localPath, remotePath),
            shell: (tokens) => this.shell(target, tokens),
        };
    }

    getDevice(): Target | null {
        return this.bound;
    }

    // ── Session operations ──────────────────────────────────

    private async push(target: Target, localPath: string, remotePath: string): Promise<void> {
        if (!fs.existsSync(localPath)) {
            throw new TransferError(`Local file not found: ${localPath}`, target, localPath, remotePath);
        }

        let outcome: ProcessOutcome;
        try {
            outcome = await this.spawnAdb(['-s', target, 'push', localPath, remotePath], false);
        } catch (err) {
            const cause = toError(err);
            throw new TransferError(`adb push failed: ${cause.message}`, target, localPath, remotePath, cause);
        }

        if (outcome.code !== 0) {
            const detail = outcome.stderr.trim() || outcome.stdout.trim();
            throw new TransferError(
                `adb push exited with ${outcome.code}: ${detail}`,
                target,
                localPath,
                remotePath,
            );
        }
        this.logger.debug(outcome.stdout.trim(), { target, remotePath });
    }

    private async shell(target: Target, tokens: readonly string[]): Promise<ShellResult> {
        let outcome: ProcessOutcome;
        try {
            outcome = await this.spawnAdb(['-s', target, 'shell', ...tokens], true);
        } catch (err) {
            const cause = toError(err);
            throw new ExecutionError(`adb shell failed: ${cause.message}`, target, tokens, cause);
        }

        if (outcome.signal) {
            throw new ExecutionError(`adb shell terminated by ${outcome.signal}`, target, tokens);
        }
        return { exitCode: outcome.code };
    }

    // ── Process helpers ─────────────────────────────────────

    private async run(operation: string, args: string[]): Promise<ProcessOutcome> {
        try {
            return await this.spawnAdb(args, false);
        } catch (err) {
            const cause = toError(err);
            throw new BridgeError('EXECUTION_FAILED', `adb ${operation} failed: ${cause.message}`, operation, undefined, cause);
        }
    }

    /** Writes a chunk to the output sink, pausing `source` until the sink drains. */
    private forward(source: Readable, chunk: Buffer): void {
        if (!this.output.write(chunk)) {
            source.pause();
            this.output.once('drain', () => source.resume());
        }
    }

    /**
     * Spawns adb with `args`. With `stream` set, output chunks go straight to
     * the output sink instead of being buffered.
     */
    private spawnAdb(args: string[], stream: boolean): Promise<ProcessOutcome> {
        return new Promise<ProcessOutcome>((resolve, reject) => {
            const child = spawn(this.adbPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];

            child.stdout.on('data', (chunk: Buffer) => {
                if (stream) this.forward(child.stdout, chunk);
                else stdout.push(chunk);
            });
            child.stderr.on('data', (chunk: Buffer) => {
                if (stream) this.forward(child.stderr, chunk);
                else stderr.push(chunk);
            });

            child.on('error', reject);
            child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
                resolve({
                    code,
                    signal,
                    stdout: Buffer.concat(stdout).toString('utf-8'),
                    stderr: Buffer.concat(stderr).toString('utf-8'),
                });
            });
        });
    }
}
