import fs from 'fs';
import { ConfigError } from './ConfigError.js';
import { DEFAULT_SIZE } from '../benchmark/options.js';
import type { BridgeKind, HarnessConfig, LogLevel } from '../types/index.js';

export type ConfigOverrides = { -readonly [K in keyof HarnessConfig]?: HarnessConfig[K] };

export interface ParsedArgs {
    help: boolean;
    configPath?: string;
    overrides: ConfigOverrides;
}

export interface ResolvedConfig {
    help: boolean;
    config: HarnessConfig;
}

const BRIDGE_KINDS: readonly BridgeKind[] = ['adb', 'simulated'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export const DEFAULT_ARTIFACT_PATH = 'output/MatrixMultiplication';
export const DEFAULT_REMOTE_DIRECTORY = '/data/local/tmp/';
export const DEFAULT_SIMULATED_DEVICES: readonly string[] = ['emulator-5554'];

// ── Value parsing ───────────────────────────────────────────

export function parseSize(value: unknown, source: string): number {
    const size = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
    if (typeof size !== 'number' || !Number.isSafeInteger(size) || size <= 0) {
        throw new ConfigError(`size must be a positive integer, got ${JSON.stringify(value)}`, source);
    }
    return size;
}

function parseBridge(value: unknown, source: string): BridgeKind {
    const kind = BRIDGE_KINDS.find((k) => k === value);
    if (!kind) {
        throw new ConfigError(`bridge must be one of ${BRIDGE_KINDS.join(', ')}, got ${JSON.stringify(value)}`, source);
    }
    return kind;
}

function parseLogLevel(value: unknown, source: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new ConfigError(`log level must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(value)}`, source);
    }
    return level;
}

function expectString(value: unknown, source: string): string {
    if (typeof value !== 'string' || value.length === 0) {
        throw new ConfigError(`expected a non-empty string, got ${JSON.stringify(value)}`, source);
    }
    return value;
}

function expectBoolean(value: unknown, source: string): boolean {
    if (typeof value !== 'boolean') {
        throw new ConfigError(`expected a boolean, got ${JSON.stringify(value)}`, source);
    }
    return value;
}

function expectStringList(value: unknown, source: string): string[] {
    if (!Array.isArray(value)) {
        throw new ConfigError(`expected an array of strings, got ${JSON.stringify(value)}`, source);
    }
    return value.map((item, idx) => expectString(item, `${source}[${idx}]`));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Sources ─────────────────────────────────────────────────

/**
 * Defaults, with environment variables applied on top.
 */
export function defaultConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
    return {
        size: DEFAULT_SIZE,
        check: false,
        debugSweep: false,
        artifactPath: env.DEVBENCH_ARTIFACT || DEFAULT_ARTIFACT_PATH,
        remoteDirectory: env.DEVBENCH_REMOTE_DIR || DEFAULT_REMOTE_DIRECTORY,
        bridge: env.DEVBENCH_BRIDGE ? parseBridge(env.DEVBENCH_BRIDGE, 'DEVBENCH_BRIDGE') : 'adb',
        adbPath: env.ADB_PATH || 'adb',
        logLevel: env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL, 'LOG_LEVEL') : 'info',
        simulatedDevices: env.DEVBENCH_SIM_DEVICES !== undefined
            ? env.DEVBENCH_SIM_DEVICES.split(',').map((s) => s.trim()).filter(Boolean)
            : DEFAULT_SIMULATED_DEVICES,
    };
}

/**
 * Reads a JSON config file. Keys mirror {@link HarnessConfig}; unknown keys
 * are rejected.
 */
export function loadConfigFile(configPath: string): ConfigOverrides {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`cannot read config file (${message})`, configPath);
    }
    return parseConfigObject(raw, configPath);
}

export function parseConfigObject(raw: unknown, source: string): ConfigOverrides {
    if (!isRecord(raw)) {
        throw new ConfigError('expected a JSON object', source);
    }

    const overrides: ConfigOverrides = {};
    for (const [key, value] of Object.entries(raw)) {
        const where = `${source}: ${key}`;
        switch (key) {
            case 'size':
                overrides.size = parseSize(value, where);
                break;
            case 'check':
            case 'debugSweep':
                overrides[key] = expectBoolean(value, where);
                break;
            case 'artifactPath':
            case 'remoteDirectory':
            case 'adbPath':
                overrides[key] = expectString(value, where);
                break;
            case 'bridge':
                overrides.bridge = parseBridge(value, where);
                break;
            case 'logLevel':
                overrides.logLevel = parseLogLevel(value, where);
                break;
            case 'simulatedDevices':
                overrides.simulatedDevices = expectStringList(value, where);
                break;
            default:
                throw new ConfigError(`unknown key "${key}"`, source);
        }
    }
    return overrides;
}

/**
 * Parses command-line flags. Both `--flag value` and `--flag=value` are
 * accepted for flags that take a value; switches reject `=value`.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const parsed: ParsedArgs = { help: false, overrides: {} };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.indexOf('=');
        const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
        const inline = flag !== arg ? arg.slice(eq + 1) : undefined;

        const takeValue = (): string => {
            if (inline !== undefined) return inline;
            const next = argv[i + 1];
            if (next === undefined || next.startsWith('--')) {
                throw new ConfigError('missing value', flag);
            }
            i++;
            return next;
        };
        const noValue = (): true => {
            if (inline !== undefined) {
                throw new ConfigError('does not take a value', flag);
            }
            return true;
        };

        switch (flag) {
            case '-h':
            case '--help':
                parsed.help = noValue();
                break;
            case '--debug':
                parsed.overrides.debugSweep = noValue();
                break;
            case '--check':
                parsed.overrides.check = noValue();
                break;
            case '--size':
                parsed.overrides.size = parseSize(takeValue(), flag);
                break;
            case '--artifact':
                parsed.overrides.artifactPath = expectString(takeValue(), flag);
                break;
            case '--remote-dir':
                parsed.overrides.remoteDirectory = expectString(takeValue(), flag);
                break;
            case '--bridge':
                parsed.overrides.bridge = parseBridge(takeValue(), flag);
                break;
            case '--log-level':
                parsed.overrides.logLevel = parseLogLevel(takeValue(), flag);
                break;
            case '--config':
                parsed.configPath = expectString(takeValue(), flag);
                break;
            default:
                throw new ConfigError('unknown option', arg);
        }
    }
    return parsed;
}

/**
 * Layers defaults (with env), an optional config file, then CLI flags into
 * one frozen configuration.
 */
export function resolveConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
    const args = parseArgs(argv);
    const fromFile = args.configPath ? loadConfigFile(args.configPath) : {};
    const merged: HarnessConfig = { ...defaultConfig(env), ...fromFile, ...args.overrides };

    return {
        help: args.help,
        config: Object.freeze({
            ...merged,
            simulatedDevices: Object.freeze([...merged.simulatedDevices]),
        }),
    };
}

export const USAGE = `
devbench — deploy and benchmark a native binary on an attached device

Usage:
  devbench [options]

Options:
  --size <n>              Problem size passed to the binary (default ${DEFAULT_SIZE})
  --check                 Ask the binary to verify its result
  --debug                 Profile test modes 1-11 with simpleperf stat
  --artifact <path>       Local binary to deploy (default ${DEFAULT_ARTIFACT_PATH})
  --remote-dir <dir>      Device directory to stage into (default ${DEFAULT_REMOTE_DIRECTORY})
  --bridge <adb|simulated>
  --log-level <error|warn|info|debug>
  --config <file.json>    Load settings from a JSON file
  -h, --help              Show this message
`.trim();
