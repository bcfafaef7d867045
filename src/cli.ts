#!/usr/bin/env node

import type { Writable } from 'stream';
import type winston from 'winston';
import { BenchmarkOrchestrator } from './benchmark/BenchmarkOrchestrator.js';
import { DiscoveryEmptyError } from './bridge/BridgeError.js';
import { createDeviceBridge } from './bridge/DeviceBridgeFactory.js';
import type { DeviceBridge } from './bridge/DeviceBridge.js';
import { ConfigError } from './config/ConfigError.js';
import { resolveConfig, USAGE, type ResolvedConfig } from './config/HarnessConfig.js';
import { createLogger } from './utils/logger.js';
import type { HarnessConfig } from './types/index.js';

export interface CliDeps {
    env?: NodeJS.ProcessEnv;
    stdout?: Writable;
    stderr?: Writable;
    logger?: winston.Logger;
    createBridge?: (config: HarnessConfig, logger: winston.Logger, output: Writable) => DeviceBridge;
}

/**
 * Runs the harness and resolves with the process exit code. Failures other
 * than bad input and an empty device list are rethrown.
 */
export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
    const stdout = deps.stdout ?? process.stdout;
    const stderr = deps.stderr ?? process.stderr;

    let resolved: ResolvedConfig;
    try {
        resolved = resolveConfig(argv, deps.env ?? process.env);
    } catch (err) {
        if (err instanceof ConfigError) {
            stderr.write(`Error: ${err.message}\n\n${USAGE}\n`);
            return 1;
        }
        throw err;
    }

    const { help, config } = resolved;
    if (help) {
        stdout.write(`${USAGE}\n`);
        return 0;
    }

    const logger = deps.logger ?? createLogger(config.logLevel, 'devbench');
    const bridge = (deps.createBridge ?? createDeviceBridge)(config, logger, stdout);
    const orchestrator = new BenchmarkOrchestrator(bridge, config, logger);

    try {
        await orchestrator.run();
    } catch (err) {
        if (err instanceof DiscoveryEmptyError) {
            stderr.write(`${err.message}\n`);
            return 1;
        }
        throw err;
    }
    return 0;
}

if (require.main === module) {
    run(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((err) => {
            console.error('Fatal error:', err);
            process.exit(1);
        });
}
