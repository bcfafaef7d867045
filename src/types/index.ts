// ── Device Bridge ───────────────────────────────────────────

/** adb serial (or any other transport's device identifier). */
export type Target = string;

export interface ShellResult {
    /** Exit status reported for the remote command. Never interpreted by the harness. */
    exitCode: number | null;
}

export interface PushRecord {
    target: Target;
    localPath: string;
    remotePath: string;
}

export interface ShellRecord {
    target: Target;
    tokens: readonly string[];
}

// ── Benchmark ───────────────────────────────────────────────

export interface BenchmarkConfig {
    readonly size: number;
    readonly check: boolean;
    readonly debugSweep: boolean;
}

/** Ordered flag tokens, passed to the remote binary in this exact order. */
export type OptionSet = readonly string[];

/** One fully assembled remote command line. */
export type Invocation = readonly string[];

export interface OrchestrationResult {
    target: Target;
    invocations: Invocation[];
    exitCodes: Array<number | null>;
}

// ── Harness ─────────────────────────────────────────────────

export type BridgeKind = 'adb' | 'simulated';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface HarnessConfig extends BenchmarkConfig {
    readonly artifactPath: string;
    readonly remoteDirectory: string;
    readonly bridge: BridgeKind;
    readonly adbPath: string;
    readonly logLevel: LogLevel;
    readonly simulatedDevices: readonly Target[];
}
