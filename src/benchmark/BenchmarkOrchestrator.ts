import path from 'path';
import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { DiscoveryEmptyError } from '../bridge/BridgeError.js';
import type { DeviceBridge } from '../bridge/DeviceBridge.js';
import { buildInvocation, buildOptions } from './options.js';
import { buildSweepInvocations } from './sweep.js';
import type { BenchmarkConfig, HarnessConfig, Invocation, OrchestrationResult } from '../types/index.js';

export type OrchestratorConfig = BenchmarkConfig & Pick<HarnessConfig, 'artifactPath' | 'remoteDirectory'>;

/** Where the artifact lands on the device: the remote directory plus the local base name. */
export function remoteArtifactPath(artifactPath: string, remoteDirectory: string): string {
    return path.posix.join(remoteDirectory, path.basename(artifactPath));
}

/**
 * The remote command lines a run issues after staging: one plain invocation,
 * or one profiled invocation per sweep test mode.
 */
export function planInvocations(config: BenchmarkConfig, remotePath: string): Invocation[] {
    const options = buildOptions(config);
    return config.debugSweep
        ? buildSweepInvocations(remotePath, options)
        : [buildInvocation(remotePath, options)];
}

/**
 * BenchmarkOrchestrator — drives one benchmark session end to end:
 * discover, bind the first device, stage the artifact, then run the planned
 * invocations one after another. Nothing is retried; the first failure after
 * binding aborts the remaining steps.
 */
export class BenchmarkOrchestrator {
    private readonly logger: winston.Logger;

    constructor(
        private readonly bridge: DeviceBridge,
        private readonly config: OrchestratorConfig,
        logger?: winston.Logger,
    ) {
        this.logger = logger ?? createLogger('info', 'orchestrator');
    }

    async run(): Promise<OrchestrationResult> {
        await this.logVersion();

        const devices = await this.bridge.devices();
        this.logger.info('Discovered devices', { devices });
        const [target] = devices;
        if (target === undefined) {
            throw new DiscoveryEmptyError();
        }

        const session = this.bridge.setDevice(target);
        this.logger.info(`Bound to ${session.target}`);

        const remotePath = remoteArtifactPath(this.config.artifactPath, this.config.remoteDirectory);
        await session.push(this.config.artifactPath, this.config.remoteDirectory);
        await session.shell(['chmod', '777', remotePath]);

        const invocations = planInvocations(this.config, remotePath);
        const exitCodes: Array<number | null> = [];
        for (const [idx, invocation] of invocations.entries()) {
            this.logger.info(`Invocation ${idx + 1}/${invocations.length}: ${invocation.join(' ')}`);
            const result = await session.shell(invocation);
            exitCodes.push(result.exitCode);
        }

        return { target, invocations, exitCodes };
    }

    private async logVersion(): Promise<void> {
        try {
            this.logger.info(`Bridge version: ${await this.bridge.version()}`);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            this.logger.warn(`Could not read bridge version: ${message}`);
        }
    }
}
